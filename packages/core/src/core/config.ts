import type {
  FunctionConfig,
  FunctionTypes,
  ProcessingGuarantee,
  Runtime,
} from './types.js';

// ── Project config ──────────────────────────────────────────────────

export interface FunctionDefaults {
  readonly tenant?: string;
  readonly namespace?: string;
  readonly runtime?: Runtime;
  readonly parallelism?: number;
  readonly processingGuarantees?: ProcessingGuarantee;
}

export interface FnConfigProjectConfig {
  /** Applied to every function config that leaves the field unset. */
  readonly defaults?: FunctionDefaults;
  /**
   * Declared input/output type classes, keyed by function class name. Used
   * to check serde and schema choices for JAVA functions.
   */
  readonly functionTypes?: Readonly<Record<string, FunctionTypes>>;
}

// ── defineConfig ─────────────────────────────────────────────────────

export function defineConfig(config: FnConfigProjectConfig): FnConfigProjectConfig {
  if (config.defaults?.parallelism !== undefined && config.defaults.parallelism <= 0) {
    throw new Error('defaults.parallelism must be a positive number');
  }

  for (const [className, types] of Object.entries(config.functionTypes ?? {})) {
    if (types.input.trim() === '' || types.output.trim() === '') {
      throw new Error(`functionTypes['${className}'] must declare both input and output types`);
    }
  }

  return Object.freeze(config);
}

// ── defineFunction ───────────────────────────────────────────────────

export function defineFunction(config: FunctionConfig): FunctionConfig {
  return Object.freeze(config);
}

// ── applyFunctionDefaults ───────────────────────────────────────────

export function applyFunctionDefaults(
  config: FunctionConfig,
  defaults: FunctionDefaults | undefined,
): FunctionConfig {
  if (!defaults) return config;
  return {
    ...config,
    tenant: config.tenant ?? defaults.tenant,
    namespace: config.namespace ?? defaults.namespace,
    runtime: config.runtime ?? defaults.runtime,
    parallelism: config.parallelism ?? defaults.parallelism,
    processingGuarantees: config.processingGuarantees ?? defaults.processingGuarantees,
  };
}
