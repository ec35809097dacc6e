import type { FunctionConfig, Resources, UserConfig } from './types.js';

// ── Environment configuration ────────────────────────────────────────

export interface FunctionOverrides {
  readonly tenant?: string;
  readonly namespace?: string;
  readonly parallelism?: number;
  readonly resources?: Resources;
  readonly userConfig?: UserConfig;
}

export interface EnvironmentConfig {
  readonly name: string;
  readonly cluster?: {
    readonly tenant?: string;
    readonly namespace?: string;
  };
  /** Keyed by function name; `'*'` applies to every function. */
  readonly functionOverrides?: Readonly<Record<string, FunctionOverrides>>;
}

// ── Resolution ───────────────────────────────────────────────────────

function mergeOverrides(base: FunctionOverrides, next: FunctionOverrides): FunctionOverrides {
  return {
    tenant: next.tenant ?? base.tenant,
    namespace: next.namespace ?? base.namespace,
    parallelism: next.parallelism ?? base.parallelism,
    resources: next.resources ?? base.resources,
    userConfig: base.userConfig || next.userConfig
      ? { ...base.userConfig, ...next.userConfig }
      : undefined,
  };
}

/** Cluster settings, then wildcard overrides, then the function's own. */
export function resolveEnvironment(
  functionName: string,
  env: EnvironmentConfig,
): FunctionOverrides {
  let result: FunctionOverrides = {
    tenant: env.cluster?.tenant,
    namespace: env.cluster?.namespace,
  };

  const overrides = env.functionOverrides;
  if (!overrides) return result;

  const wildcard = overrides['*'];
  if (wildcard) {
    result = mergeOverrides(result, wildcard);
  }

  const named = overrides[functionName];
  if (named) {
    result = mergeOverrides(result, named);
  }

  return result;
}

export function applyOverrides(config: FunctionConfig, overrides: FunctionOverrides): FunctionConfig {
  return {
    ...config,
    tenant: overrides.tenant ?? config.tenant,
    namespace: overrides.namespace ?? config.namespace,
    parallelism: overrides.parallelism ?? config.parallelism,
    resources: overrides.resources ?? config.resources,
    userConfig: overrides.userConfig
      ? { ...config.userConfig, ...overrides.userConfig }
      : config.userConfig,
  };
}

// ── Auto-discovery ───────────────────────────────────────────────────

export function discoverEnvironments(
  envDir: string,
  files: readonly string[],
): Array<{ name: string; path: string }> {
  return files
    .filter((f) => f.endsWith('.ts') && !f.endsWith('.d.ts'))
    .map((f) => ({
      name: f.replace(/\.ts$/, ''),
      path: `${envDir}/${f}`,
    }));
}

// ── defineEnvironment ───────────────────────────────────────────────

export function defineEnvironment(config: EnvironmentConfig): EnvironmentConfig {
  return Object.freeze(config);
}
