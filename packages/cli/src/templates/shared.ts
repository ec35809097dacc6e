import type { FunctionTypes } from '@fnconfig/core';

export interface TemplateFile {
  readonly path: string;
  readonly content: string;
}

export interface ProjectTemplate {
  readonly hint: string;
  files(projectName: string): TemplateFile[];
}

const CORE_VERSION = '^0.0.1';

function json(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

function projectConfig(functionTypes: Readonly<Record<string, FunctionTypes>> | undefined): string {
  const lines = [
    `import { defineConfig } from '@fnconfig/core';`,
    '',
    'export default defineConfig({',
    `  defaults: { tenant: 'public', namespace: 'default' },`,
  ];
  if (functionTypes) {
    // Type tables stand in for the generics a jar would declare.
    lines.push(`  functionTypes: ${json(functionTypes).trimEnd().replace(/\n/g, '\n  ')},`);
  }
  lines.push('});', '');
  return lines.join('\n');
}

const DEV_ENVIRONMENT = `import { defineEnvironment } from '@fnconfig/core';

export default defineEnvironment({
  name: 'dev',
  functionOverrides: {
    '*': { parallelism: 1 },
  },
});
`;

/** Files every project gets, whatever runtime its functions use. */
export function projectFiles(
  projectName: string,
  functionTypes?: Readonly<Record<string, FunctionTypes>>,
): TemplateFile[] {
  return [
    {
      path: 'package.json',
      content: json({
        name: projectName,
        private: true,
        type: 'module',
        scripts: { validate: 'fnconfig validate', convert: 'fnconfig convert' },
        devDependencies: {
          '@fnconfig/cli': CORE_VERSION,
          '@fnconfig/core': CORE_VERSION,
          typescript: '^5.6.3',
        },
      }),
    },
    {
      path: 'tsconfig.json',
      content: json({
        compilerOptions: {
          module: 'NodeNext',
          moduleResolution: 'NodeNext',
          strict: true,
          noEmit: true,
        },
        include: ['fnconfig.config.ts', 'env', 'functions'],
      }),
    },
    { path: '.gitignore', content: 'node_modules/\ndist/\n' },
    { path: 'fnconfig.config.ts', content: projectConfig(functionTypes) },
    { path: 'env/dev.ts', content: DEV_ENVIRONMENT },
  ];
}
