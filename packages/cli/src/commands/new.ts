import { Command } from 'commander';
import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { JAVA_TEMPLATE } from '../templates/java.js';
import { PYTHON_TEMPLATE } from '../templates/python.js';
import type { ProjectTemplate, TemplateFile } from '../templates/shared.js';

export type TemplateName = 'java' | 'python';

const TEMPLATE_NAMES: readonly TemplateName[] = ['java', 'python'];

export const TEMPLATES: Readonly<Record<TemplateName, ProjectTemplate>> = {
  java: JAVA_TEMPLATE,
  python: PYTHON_TEMPLATE,
};

export interface NewCommandOptions {
  readonly template?: string;
}

// ── Command registration ────────────────────────────────────────────

export function registerNewCommand(program: Command): void {
  program
    .command('new')
    .argument('<directory>', 'Directory to create the project in')
    .option('-t, --template <name>', `Function runtime (${TEMPLATE_NAMES.join(', ')})`)
    .description('Scaffold a function project')
    .action(async (directory: string, opts: NewCommandOptions) => {
      await runNew(directory, opts);
    });
}

// ── New logic ───────────────────────────────────────────────────────

/** Returns the project-relative paths written, or none when nothing was created. */
export async function runNew(directory: string, opts: NewCommandOptions): Promise<string[]> {
  const projectDir = resolve(directory);

  if (existsSync(projectDir)) {
    console.error(pc.red(`Error: ${directory} already exists`));
    process.exitCode = 1;
    return [];
  }

  const template = opts.template === undefined ? await promptTemplate() : findTemplate(opts.template);
  if (template === null) return [];

  const written = writeFiles(projectDir, TEMPLATES[template].files(basename(projectDir)));

  console.log(pc.green(`Created a ${template} function project in ${directory}`));
  for (const path of written) {
    console.log(`  ${pc.dim(path)}`);
  }
  console.log(`\n  ${pc.dim('next:')} cd ${directory} && npm install && npm run validate\n`);
  return written;
}

function findTemplate(name: string): TemplateName | null {
  const found = TEMPLATE_NAMES.find((t) => t === name);
  if (!found) {
    console.error(pc.red(`Unknown template: ${name}`));
    console.error(pc.dim(`Available: ${TEMPLATE_NAMES.join(', ')}`));
    process.exitCode = 1;
    return null;
  }
  return found;
}

async function promptTemplate(): Promise<TemplateName | null> {
  const picked = await clack.select<TemplateName>({
    message: 'Which runtime will the function use?',
    options: TEMPLATE_NAMES.map((name) => ({ value: name, label: name, hint: TEMPLATES[name].hint })),
  });

  if (clack.isCancel(picked)) {
    clack.cancel('No project created.');
    return null;
  }
  return picked;
}

function writeFiles(projectDir: string, files: readonly TemplateFile[]): string[] {
  for (const file of files) {
    const target = join(projectDir, file.path);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, file.content, 'utf-8');
  }
  return files.map((f) => f.path);
}
