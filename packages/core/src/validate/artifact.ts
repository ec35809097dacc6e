import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { FunctionConfig, FunctionTypes } from '../core/types.js';
import { ArtifactError, errorMessage } from '../core/errors.js';

export const BUILTIN_SCHEME = 'builtin://';

// ── Locators ────────────────────────────────────────────────────────

export type ArtifactLocator =
  | { readonly kind: 'url'; readonly url: string }
  | { readonly kind: 'file'; readonly path: string };

export function isPackageUrlSupported(locator: string): boolean {
  return locator.startsWith('http') || locator.startsWith('file:');
}

export function isBuiltin(locator: string): boolean {
  return locator.startsWith(BUILTIN_SCHEME);
}

export function describeLocator(locator: ArtifactLocator): string {
  return locator.kind === 'url' ? locator.url : locator.path;
}

// ── Handles ─────────────────────────────────────────────────────────

/** An opened function package. Handed back to the caller after validation. */
export interface ArtifactHandle {
  readonly locator: string;
  readonly entries: ReadonlySet<string>;
  hasClass(className: string): boolean;
}

export function classEntryName(className: string): string {
  return `${className.replace(/\./g, '/')}.class`;
}

export function createArtifactHandle(locator: string, entries: Iterable<string>): ArtifactHandle {
  const entrySet: ReadonlySet<string> = new Set(entries);
  return {
    locator,
    entries: entrySet,
    hasClass: (className: string) => entrySet.has(classEntryName(className)),
  };
}

export interface ArtifactLoader {
  load(locator: ArtifactLocator): Promise<ArtifactHandle>;
}

export interface FunctionTypeResolver {
  resolve(config: FunctionConfig, artifact: ArtifactHandle): Promise<FunctionTypes>;
}

// ── Archive listing ─────────────────────────────────────────────────

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
const EOCD_MIN_SIZE = 22;

/** Names of the file entries in a zip archive's central directory. */
export function listArchiveEntries(data: Uint8Array): string[] {
  const view = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (view.length < EOCD_MIN_SIZE) {
    throw new Error('archive is too short');
  }

  const maxSearch = Math.min(view.length, 0x10000 + EOCD_MIN_SIZE);
  let eocdOffset = -1;
  for (let i = view.length - EOCD_MIN_SIZE; i >= view.length - maxSearch && i >= 0; i -= 1) {
    if (view.readUInt32LE(i) === EOCD_SIGNATURE) {
      eocdOffset = i;
      break;
    }
  }
  if (eocdOffset < 0) {
    throw new Error('end of central directory not found');
  }

  const count = view.readUInt16LE(eocdOffset + 10);
  let offset = view.readUInt32LE(eocdOffset + 16);
  const entries: string[] = [];

  for (let i = 0; i < count; i += 1) {
    if (offset + 46 > view.length || view.readUInt32LE(offset) !== CENTRAL_DIRECTORY_SIGNATURE) {
      throw new Error('central directory is corrupt');
    }
    const nameLen = view.readUInt16LE(offset + 28);
    const extraLen = view.readUInt16LE(offset + 30);
    const commentLen = view.readUInt16LE(offset + 32);
    const nameStart = offset + 46;
    const name = view.subarray(nameStart, nameStart + nameLen).toString('utf8');
    offset = nameStart + nameLen + extraLen + commentLen;
    if (!name.endsWith('/')) entries.push(name);
  }

  return entries;
}

// ── Local loader ────────────────────────────────────────────────────

async function readLocator(locator: ArtifactLocator): Promise<Uint8Array> {
  if (locator.kind === 'file') {
    return readFile(locator.path);
  }
  if (locator.url.startsWith('file:')) {
    return readFile(fileURLToPath(locator.url));
  }
  if (locator.url.startsWith('http')) {
    const response = await fetch(locator.url);
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} fetching ${locator.url}`);
    }
    return new Uint8Array(await response.arrayBuffer());
  }
  throw new Error(`Unsupported package URL: ${locator.url}`);
}

/** Reads jar archives from disk, file: URLs, or http(s) and lists their entries. */
export const localArtifactLoader: ArtifactLoader = {
  async load(locator: ArtifactLocator): Promise<ArtifactHandle> {
    const where = describeLocator(locator);
    let data: Uint8Array;
    try {
      data = await readLocator(locator);
    } catch (err) {
      throw new ArtifactError(`Could not read function package ${where}: ${errorMessage(err)}`, {
        locator: where,
        cause: err,
      });
    }

    try {
      return createArtifactHandle(where, listArchiveEntries(data));
    } catch (err) {
      throw new ArtifactError(`Corrupted Jar File: ${errorMessage(err)}`, { locator: where, cause: err });
    }
  },
};

// ── Static type resolver ────────────────────────────────────────────

/**
 * Resolves input/output types from a declared table keyed by function class.
 * The class itself must be present in the artifact.
 */
export function staticTypeResolver(
  table: Readonly<Record<string, FunctionTypes>>,
): FunctionTypeResolver {
  return {
    async resolve(config: FunctionConfig, artifact: ArtifactHandle): Promise<FunctionTypes> {
      const className = config.className ?? '';
      if (!artifact.hasClass(className)) {
        throw new ArtifactError(`User class ${className} must be in class path`, {
          locator: artifact.locator,
        });
      }
      const types = table[className];
      if (!types) {
        throw new ArtifactError(`Could not resolve input and output types of ${className}`, {
          locator: artifact.locator,
        });
      }
      return types;
    },
  };
}
