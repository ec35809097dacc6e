import { Command } from 'commander';
import pc from 'picocolors';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { encodeFunctionDetails, toDetails } from '@fnconfig/core';
import type { FunctionDetails } from '@fnconfig/core';
import { resolveProjectContext } from '../discovery.js';
import { checkFunction, type ValidateCommandOptions } from './validate.js';

export const DETAILS_JSON_FILE = 'function-details.json';
export const DETAILS_BINARY_FILE = 'function-details.pb';

// ── Types ───────────────────────────────────────────────────────────

export interface ConvertResult {
  readonly name: string;
  readonly details: FunctionDetails;
}

export interface ConvertCommandOptions extends ValidateCommandOptions {
  readonly outdir: string;
}

// ── Command registration ────────────────────────────────────────────

export function registerConvertCommand(program: Command): void {
  program
    .command('convert')
    .description('Validate function configs and write runtime descriptors')
    .option('-f, --fn <name>', 'Convert a specific function')
    .option('-e, --env <name>', 'Environment name (loads env/<name>.ts)')
    .option('-o, --outdir <dir>', 'Output directory', 'dist')
    .option('--package-url <url>', 'Function package URL (http, https or file)')
    .option('--package-file <path>', 'Function package already on local disk')
    .action(async (opts: ConvertCommandOptions) => {
      await runConvert(opts);
    });
}

// ── Convert logic ───────────────────────────────────────────────────

export async function runConvert(opts: ConvertCommandOptions): Promise<ConvertResult[]> {
  const projectDir = opts.projectDir ?? process.cwd();
  const ctx = await resolveProjectContext(projectDir, { fn: opts.fn, env: opts.env });

  if (ctx.functions.length === 0) {
    console.log(pc.yellow('No functions found in functions/ directory.'));
    return [];
  }

  console.log(pc.dim(`Converting ${ctx.functions.length} function(s)...\n`));

  const results: ConvertResult[] = [];
  let hasErrors = false;

  for (const discovered of ctx.functions) {
    const outcome = await checkFunction(ctx, discovered, opts);

    if (!outcome.ok) {
      hasErrors = true;
      console.log(pc.red(`  ${outcome.name}: ${outcome.error}`));
      console.log(pc.dim(`    at ${discovered.entryPoint}`));
      continue;
    }

    const result: ConvertResult = {
      name: outcome.name,
      details: toDetails(outcome.config, outcome.result.types),
    };
    results.push(result);
    writeFunctionOutput(result, opts.outdir, projectDir);
  }

  if (hasErrors) {
    console.log(pc.red(`\nConversion failed with errors.`));
    process.exitCode = 1;
    return results;
  }

  console.log(pc.green(`\nConversion complete. ${results.length} function(s) written.\n`));

  for (const result of results) {
    console.log(`  ${pc.cyan(result.name)} ${pc.dim(`→ ${opts.outdir}/${result.name}/`)}`);
  }

  console.log('');
  return results;
}

// ── Output ──────────────────────────────────────────────────────────

function writeFunctionOutput(result: ConvertResult, outdir: string, projectDir: string): void {
  const functionDir = join(projectDir, outdir, result.name);
  mkdirSync(functionDir, { recursive: true });

  // JSON for reading and diffing, protobuf for submission
  writeFileSync(join(functionDir, DETAILS_JSON_FILE), JSON.stringify(result.details, null, 2) + '\n', 'utf-8');
  writeFileSync(join(functionDir, DETAILS_BINARY_FILE), encodeFunctionDetails(result.details));
}
