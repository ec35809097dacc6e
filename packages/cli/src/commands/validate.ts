import { Command } from 'commander';
import pc from 'picocolors';
import {
  errorMessage,
  inferMissingWindowArguments,
  isArtifactError,
  isInvalidConfiguration,
  staticTypeResolver,
  validate,
} from '@fnconfig/core';
import type { FunctionConfig, ValidateOptions, ValidationResult } from '@fnconfig/core';
import {
  resolveFunction,
  resolveProjectContext,
  type DiscoveredFunction,
  type ProjectContext,
} from '../discovery.js';

// ── Types ───────────────────────────────────────────────────────────

export interface ValidateCommandOptions {
  readonly fn?: string;
  readonly env?: string;
  readonly packageUrl?: string;
  readonly packageFile?: string;
  readonly projectDir?: string;
}

export type FunctionOutcome =
  | { readonly name: string; readonly ok: true; readonly config: FunctionConfig; readonly result: ValidationResult }
  | { readonly name: string; readonly ok: false; readonly error: string };

// ── Command registration ────────────────────────────────────────────

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check function configs without producing output')
    .option('-f, --fn <name>', 'Validate a specific function')
    .option('-e, --env <name>', 'Environment name (loads env/<name>.ts)')
    .option('--package-url <url>', 'Function package URL (http, https or file)')
    .option('--package-file <path>', 'Function package already on local disk')
    .action(async (opts: ValidateCommandOptions) => {
      await runValidate(opts);
    });
}

// ── Shared per-function pipeline ────────────────────────────────────

export function validateOptionsFor(ctx: ProjectContext, opts: ValidateCommandOptions): ValidateOptions {
  return {
    packageUrl: opts.packageUrl,
    uploadedFile: opts.packageFile,
    collaborators: {
      typeResolver: staticTypeResolver(ctx.config?.functionTypes ?? {}),
    },
  };
}

/** Load, fill window defaults, and validate one function. Never throws. */
export async function checkFunction(
  ctx: ProjectContext,
  discovered: DiscoveredFunction,
  opts: ValidateCommandOptions,
): Promise<FunctionOutcome> {
  try {
    const loaded = await resolveFunction(ctx, discovered);
    const config: FunctionConfig = loaded.windowConfig
      ? { ...loaded, windowConfig: inferMissingWindowArguments(loaded.windowConfig) }
      : loaded;
    const result = await validate(config, validateOptionsFor(ctx, opts));
    return { name: discovered.name, ok: true, config, result };
  } catch (err) {
    return { name: discovered.name, ok: false, error: describeError(err) };
  }
}

function describeError(err: unknown): string {
  if (isInvalidConfiguration(err)) {
    return err.field ? `${err.message} (${err.field})` : err.message;
  }
  if (isArtifactError(err)) {
    return `Package error: ${err.message}`;
  }
  return errorMessage(err);
}

// ── Validate logic ──────────────────────────────────────────────────

export async function runValidate(opts: ValidateCommandOptions): Promise<FunctionOutcome[]> {
  const projectDir = opts.projectDir ?? process.cwd();
  const ctx = await resolveProjectContext(projectDir, { fn: opts.fn, env: opts.env });

  if (ctx.functions.length === 0) {
    console.log(pc.yellow('No functions found in functions/ directory.'));
    return [];
  }

  console.log(pc.dim(`Validating ${ctx.functions.length} function(s)...\n`));

  const outcomes: FunctionOutcome[] = [];
  for (const discovered of ctx.functions) {
    const outcome = await checkFunction(ctx, discovered, opts);
    outcomes.push(outcome);

    if (outcome.ok) {
      console.log(`  ${pc.green('✓')} ${pc.cyan(outcome.name)}`);
    } else {
      console.log(`  ${pc.red('✗')} ${pc.cyan(outcome.name)}`);
      console.log(pc.red(`    ${outcome.error}`));
    }
  }

  const failed = outcomes.filter((o) => !o.ok).length;
  if (failed > 0) {
    console.log(pc.red(`\n${failed} of ${outcomes.length} function(s) failed validation.`));
    process.exitCode = 1;
  } else {
    console.log(pc.green(`\nAll ${outcomes.length} function(s) are valid.\n`));
  }

  return outcomes;
}
