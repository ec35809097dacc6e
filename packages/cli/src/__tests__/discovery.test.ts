import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ProcessingGuarantee, Runtime } from '@fnconfig/core';
import {
  discoverFunctions,
  loadConfig,
  loadEnvironment,
  loadFunction,
  resolveFunction,
  resolveProjectContext,
} from '../discovery.js';

describe('discoverFunctions', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `fnconfig-test-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns empty array when functions/ does not exist', () => {
    expect(discoverFunctions(testDir)).toEqual([]);
  });

  it('discovers functions with function.ts or function.json', () => {
    const functionsDir = join(testDir, 'functions');
    mkdirSync(join(functionsDir, 'alpha'), { recursive: true });
    mkdirSync(join(functionsDir, 'beta'), { recursive: true });

    writeFileSync(join(functionsDir, 'alpha', 'function.ts'), 'export default {};');
    writeFileSync(join(functionsDir, 'beta', 'function.json'), '{}');

    const result = discoverFunctions(testDir);

    expect(result).toEqual([
      { name: 'alpha', entryPoint: join(functionsDir, 'alpha', 'function.ts') },
      { name: 'beta', entryPoint: join(functionsDir, 'beta', 'function.json') },
    ]);
  });

  it('prefers function.ts over function.json', () => {
    const fnDir = join(testDir, 'functions', 'both');
    mkdirSync(fnDir, { recursive: true });
    writeFileSync(join(fnDir, 'function.json'), '{}');
    writeFileSync(join(fnDir, 'function.ts'), 'export default {};');

    expect(discoverFunctions(testDir)[0].entryPoint).toBe(join(fnDir, 'function.ts'));
  });

  it('ignores directories without an entry file', () => {
    const functionsDir = join(testDir, 'functions');
    mkdirSync(join(functionsDir, 'has-it'), { recursive: true });
    mkdirSync(join(functionsDir, 'no-entry'), { recursive: true });

    writeFileSync(join(functionsDir, 'has-it', 'function.json'), '{}');
    writeFileSync(join(functionsDir, 'no-entry', 'readme.md'), '# hello');
    writeFileSync(join(functionsDir, 'stray.json'), '{}');

    const result = discoverFunctions(testDir);

    expect(result.map((f) => f.name)).toEqual(['has-it']);
  });

  it('filters by target function and sorts by name', () => {
    const functionsDir = join(testDir, 'functions');
    for (const name of ['zebra', 'alpha', 'middle']) {
      mkdirSync(join(functionsDir, name), { recursive: true });
      writeFileSync(join(functionsDir, name, 'function.json'), '{}');
    }

    expect(discoverFunctions(testDir).map((f) => f.name)).toEqual(['alpha', 'middle', 'zebra']);
    expect(discoverFunctions(testDir, 'middle').map((f) => f.name)).toEqual(['middle']);
  });
});

describe('project loading', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `fnconfig-load-test-${Date.now()}`);
    mkdirSync(join(testDir, 'functions', 'exclaim'), { recursive: true });
    mkdirSync(join(testDir, 'env'), { recursive: true });

    writeFileSync(
      join(testDir, 'fnconfig.config.ts'),
      `export default {
  defaults: { tenant: 'public', namespace: 'default', parallelism: 2 },
};
`,
    );
    writeFileSync(
      join(testDir, 'env', 'prod.ts'),
      `export default {
  name: 'prod',
  cluster: { tenant: 'acme' },
  functionOverrides: { exclaim: { parallelism: 8, userConfig: { region: 'eu' } } },
};
`,
    );
    writeFileSync(
      join(testDir, 'functions', 'exclaim', 'function.ts'),
      `const guarantee: string = 'EFFECTIVELY_ONCE';

export default {
  className: 'com.example.Exclaim',
  inputs: ['persistent://public/default/in'],
  processingGuarantees: guarantee,
  userConfig: { suffix: '!' },
};
`,
    );
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('loads the project config', async () => {
    const config = await loadConfig(testDir);
    expect(config?.defaults).toEqual({ tenant: 'public', namespace: 'default', parallelism: 2 });
  });

  it('returns null without a project config', async () => {
    rmSync(join(testDir, 'fnconfig.config.ts'));
    expect(await loadConfig(testDir)).toBeNull();
  });

  it('loads a named environment', async () => {
    const env = await loadEnvironment(testDir, 'prod');
    expect(env?.name).toBe('prod');
    expect(env?.cluster?.tenant).toBe('acme');
  });

  it('throws for a missing environment', async () => {
    await expect(loadEnvironment(testDir, 'staging')).rejects.toThrow(
      'Environment file not found: env/staging.ts',
    );
  });

  it('loads a TypeScript function config', async () => {
    const config = await loadFunction(join(testDir, 'functions', 'exclaim', 'function.ts'));

    expect(config.className).toBe('com.example.Exclaim');
    expect(config.processingGuarantees).toBe(ProcessingGuarantee.EFFECTIVELY_ONCE);
  });

  it('loads a JSON function config', async () => {
    const path = join(testDir, 'functions', 'exclaim', 'function.json');
    writeFileSync(path, JSON.stringify({ className: 'com.example.Json', runtime: 'GO' }));

    const config = await loadFunction(path);
    expect(config.className).toBe('com.example.Json');
    expect(config.runtime).toBe(Runtime.GO);
  });

  it('rejects a malformed function config', async () => {
    const path = join(testDir, 'functions', 'exclaim', 'function.json');
    writeFileSync(path, JSON.stringify({ parallelism: 'many' }));

    await expect(loadFunction(path)).rejects.toThrow('parallelism must be a number');
  });

  it('layers defaults and environment overrides', async () => {
    const ctx = await resolveProjectContext(testDir, { env: 'prod' });
    const config = await resolveFunction(ctx, ctx.functions[0]);

    expect(config.name).toBe('exclaim');
    expect(config.tenant).toBe('acme');
    expect(config.namespace).toBe('default');
    expect(config.parallelism).toBe(8);
    expect(config.userConfig).toEqual({ suffix: '!', region: 'eu' });
  });

  it('applies defaults alone without an environment', async () => {
    const ctx = await resolveProjectContext(testDir);
    const config = await resolveFunction(ctx, ctx.functions[0]);

    expect(config.tenant).toBe('public');
    expect(config.parallelism).toBe(2);
    expect(config.userConfig).toEqual({ suffix: '!' });
  });
});
