import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runNew } from '../commands/new.js';

describe('fnconfig new', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'fnconfig-new-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('writes a java project', async () => {
    const projectDir = join(root, 'my-functions');
    const written = await runNew(projectDir, { template: 'java' });

    expect(written).toEqual([
      'package.json',
      'tsconfig.json',
      '.gitignore',
      'fnconfig.config.ts',
      'env/dev.ts',
      'functions/exclamation/function.ts',
    ]);
    for (const path of written) {
      expect(existsSync(join(projectDir, path))).toBe(true);
    }
  });

  it('names the package after the directory', async () => {
    const projectDir = join(root, 'my-functions');
    await runNew(projectDir, { template: 'java' });

    const pkg = JSON.parse(readFileSync(join(projectDir, 'package.json'), 'utf-8'));

    expect(pkg.name).toBe('my-functions');
    expect(pkg.type).toBe('module');
    expect(pkg.scripts.validate).toBe('fnconfig validate');
    expect(pkg.devDependencies['@fnconfig/core']).toBe('^0.0.1');
  });

  it('declares the java function types in the project config', async () => {
    const projectDir = join(root, 'java-project');
    await runNew(projectDir, { template: 'java' });

    const config = readFileSync(join(projectDir, 'fnconfig.config.ts'), 'utf-8');
    const fn = readFileSync(join(projectDir, 'functions', 'exclamation', 'function.ts'), 'utf-8');

    expect(config).toContain('    "com.example.ExclamationFunction": {');
    expect(config).toContain('      "input": "java.lang.String",');
    expect(fn).toContain("className: 'com.example.ExclamationFunction',");
  });

  it('writes a python project without a type table', async () => {
    const projectDir = join(root, 'py-project');
    const written = await runNew(projectDir, { template: 'python' });

    const config = readFileSync(join(projectDir, 'fnconfig.config.ts'), 'utf-8');

    expect(written).toContain('functions/wordcount/wordcount.py');
    expect(readFileSync(join(projectDir, 'functions', 'wordcount', 'function.ts'), 'utf-8')).toContain(
      'runtime: Runtime.PYTHON,',
    );
    expect(config).not.toContain('functionTypes');
  });

  it('rejects an unknown template', async () => {
    const projectDir = join(root, 'go-project');

    expect(await runNew(projectDir, { template: 'go' })).toEqual([]);
    expect(existsSync(projectDir)).toBe(false);
    expect(process.exitCode).toBe(1);
  });

  it('refuses to write into an existing directory', async () => {
    expect(await runNew(root, { template: 'java' })).toEqual([]);
    expect(process.exitCode).toBe(1);
  });
});
