import { InvalidConfigurationError } from './errors.js';

// ── Blank checks ────────────────────────────────────────────────────

export function isBlank(value: string | undefined | null): boolean {
  return value == null || value.trim().length === 0;
}

export function isNotBlank(value: string | undefined | null): value is string {
  return !isBlank(value);
}

export function isNotEmpty(value: string | undefined | null): value is string {
  return value != null && value.length > 0;
}

// ── Shape guards ────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Field readers ───────────────────────────────────────────────────
//
// Each reader returns undefined for a missing key and throws
// InvalidConfigurationError naming `path.key` for a value of the wrong type.

function fieldPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

export function readString(obj: Record<string, unknown>, key: string, path = ''): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidConfigurationError(`${fieldPath(path, key)} must be a string`, { field: fieldPath(path, key) });
  }
  return value;
}

export function readNumber(obj: Record<string, unknown>, key: string, path = ''): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new InvalidConfigurationError(`${fieldPath(path, key)} must be a number`, { field: fieldPath(path, key) });
  }
  return value;
}

export function readBoolean(obj: Record<string, unknown>, key: string, path = ''): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new InvalidConfigurationError(`${fieldPath(path, key)} must be a boolean`, { field: fieldPath(path, key) });
  }
  return value;
}

export function readRecord(
  obj: Record<string, unknown>,
  key: string,
  path = '',
): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new InvalidConfigurationError(`${fieldPath(path, key)} must be an object`, { field: fieldPath(path, key) });
  }
  return value;
}

export function readStringArray(obj: Record<string, unknown>, key: string, path = ''): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new InvalidConfigurationError(`${fieldPath(path, key)} must be a list of strings`, { field: fieldPath(path, key) });
  }
  return value;
}

export function readStringMap(
  obj: Record<string, unknown>,
  key: string,
  path = '',
): Record<string, string> | undefined {
  const record = readRecord(obj, key, path);
  if (!record) return undefined;
  const result = new Map<string, string>();
  for (const [name, value] of Object.entries(record)) {
    if (typeof value !== 'string') {
      const field = `${fieldPath(path, key)}.${name}`;
      throw new InvalidConfigurationError(`${field} must be a string`, { field });
    }
    result.set(name, value);
  }
  return Object.fromEntries(result);
}

export function readEnum<T extends string>(
  obj: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
  path = '',
): T | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!guard(value)) {
    throw new InvalidConfigurationError(
      `${fieldPath(path, key)} has unsupported value '${String(value)}'`,
      { field: fieldPath(path, key) },
    );
  }
  return value;
}
