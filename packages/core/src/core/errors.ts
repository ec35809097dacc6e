// ── Error taxonomy ──────────────────────────────────────────────────

/**
 * A function config breaks a rule. Never retryable: the config has to change.
 * `field` names the offending config path when there is a single one.
 */
export class InvalidConfigurationError extends Error {
  readonly field?: string;

  constructor(message: string, options?: { readonly field?: string; readonly cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'InvalidConfigurationError';
    this.field = options?.field;
  }
}

/** The function's packaged artifact could not be read or introspected. */
export class ArtifactError extends Error {
  readonly locator?: string;

  constructor(message: string, options?: { readonly locator?: string; readonly cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ArtifactError';
    this.locator = options?.locator;
  }
}

export function isInvalidConfiguration(err: unknown): err is InvalidConfigurationError {
  return err instanceof InvalidConfigurationError;
}

export function isArtifactError(err: unknown): err is ArtifactError {
  return err instanceof ArtifactError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
