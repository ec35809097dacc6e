import { readdirSync, readFileSync, existsSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { createJiti } from 'jiti';
import {
  applyFunctionDefaults,
  applyOverrides,
  isRecord,
  parseEnvironmentConfig,
  parseFunctionConfig,
  parseProjectConfig,
  resolveEnvironment,
} from '@fnconfig/core';
import type { EnvironmentConfig, FnConfigProjectConfig, FunctionConfig } from '@fnconfig/core';

// jiti handles .ts imports at runtime; config files are re-read on every load
const jiti = createJiti(import.meta.url, { moduleCache: false });

const ENTRY_FILES = ['function.ts', 'function.json'] as const;

// ── Types ───────────────────────────────────────────────────────────

export interface DiscoveredFunction {
  readonly name: string;
  readonly entryPoint: string;
}

export interface ProjectContext {
  readonly projectDir: string;
  readonly config: FnConfigProjectConfig | null;
  readonly env: EnvironmentConfig | null;
  readonly functions: readonly DiscoveredFunction[];
}

// ── Function discovery ──────────────────────────────────────────────

/**
 * Discover functions by walking the functions/ directory.
 * Each subdirectory containing a function.ts (or function.json) is a function.
 */
export function discoverFunctions(
  projectDir: string,
  targetFunction?: string,
): DiscoveredFunction[] {
  const functionsDir = join(projectDir, 'functions');

  if (!existsSync(functionsDir)) {
    return [];
  }

  const functions: DiscoveredFunction[] = [];

  for (const entry of readdirSync(functionsDir)) {
    const entryPath = join(functionsDir, entry);
    if (!statSync(entryPath).isDirectory()) continue;
    if (targetFunction && entry !== targetFunction) continue;

    const file = ENTRY_FILES.find((f) => existsSync(join(entryPath, f)));
    if (!file) continue;

    functions.push({ name: entry, entryPoint: join(entryPath, file) });
  }

  return functions.sort((a, b) => a.name.localeCompare(b.name));
}

// ── Module loading ──────────────────────────────────────────────────

async function importDefault(path: string): Promise<unknown> {
  const mod: unknown = await jiti.import(resolve(path));
  return isRecord(mod) && 'default' in mod ? mod.default : mod;
}

// ── Config loading ──────────────────────────────────────────────────

/**
 * Load the project config from fnconfig.config.ts.
 * Returns null if no config file exists.
 */
export async function loadConfig(projectDir: string): Promise<FnConfigProjectConfig | null> {
  const configPath = join(projectDir, 'fnconfig.config.ts');

  if (!existsSync(configPath)) {
    return null;
  }

  return parseProjectConfig(await importDefault(configPath));
}

// ── Environment loading ─────────────────────────────────────────────

/**
 * Load an environment config from env/<name>.ts.
 * Returns null if no env name given.
 */
export async function loadEnvironment(
  projectDir: string,
  envName?: string,
): Promise<EnvironmentConfig | null> {
  if (!envName) return null;

  const envPath = join(projectDir, 'env', `${envName}.ts`);

  if (!existsSync(envPath)) {
    throw new Error(`Environment file not found: env/${envName}.ts`);
  }

  return parseEnvironmentConfig(await importDefault(envPath));
}

// ── Function loading ────────────────────────────────────────────────

export async function loadFunction(entryPoint: string): Promise<FunctionConfig> {
  if (entryPoint.endsWith('.json')) {
    const raw: unknown = JSON.parse(readFileSync(entryPoint, 'utf-8'));
    return parseFunctionConfig(raw);
  }
  return parseFunctionConfig(await importDefault(entryPoint));
}

/**
 * Load a function and layer project defaults and environment overrides on it.
 * The directory name stands in for an unset function name.
 */
export async function resolveFunction(
  ctx: ProjectContext,
  discovered: DiscoveredFunction,
): Promise<FunctionConfig> {
  const loaded = await loadFunction(discovered.entryPoint);
  let config: FunctionConfig = { ...loaded, name: loaded.name ?? discovered.name };

  config = applyFunctionDefaults(config, ctx.config?.defaults);
  if (ctx.env) {
    config = applyOverrides(config, resolveEnvironment(config.name ?? discovered.name, ctx.env));
  }
  return config;
}

// ── Full project context ────────────────────────────────────────────

export async function resolveProjectContext(
  projectDir: string,
  options?: {
    readonly fn?: string;
    readonly env?: string;
  },
): Promise<ProjectContext> {
  const config = await loadConfig(projectDir);
  const env = await loadEnvironment(projectDir, options?.env);
  const functions = discoverFunctions(projectDir, options?.fn);

  return {
    projectDir,
    config,
    env,
    functions,
  };
}
