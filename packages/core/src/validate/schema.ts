import { InvalidConfigurationError } from '../core/errors.js';
import type { ArtifactHandle } from './artifact.js';

// ── Built-in schema types ───────────────────────────────────────────

/** Primitive schema types and the one type class each can carry. */
export const PRIMITIVE_SCHEMA_TYPES: Readonly<Record<string, string>> = {
  STRING: 'java.lang.String',
  BYTES: 'byte[]',
  BOOLEAN: 'java.lang.Boolean',
  INT8: 'java.lang.Byte',
  INT16: 'java.lang.Short',
  INT32: 'java.lang.Integer',
  INT64: 'java.lang.Long',
  FLOAT: 'java.lang.Float',
  DOUBLE: 'java.lang.Double',
  DATE: 'java.util.Date',
  TIME: 'java.sql.Time',
  TIMESTAMP: 'java.sql.Timestamp',
};

/** Schema types that encode a user-defined record class. */
export const STRUCT_SCHEMA_TYPES: ReadonlySet<string> = new Set(['AVRO', 'JSON', 'PROTOBUF']);

export const DEFAULT_SERDE_CLASS = 'org.apache.pulsar.functions.api.utils.DefaultSerDe';

const PRIMITIVE_TYPE_CLASSES: ReadonlySet<string> = new Set(Object.values(PRIMITIVE_SCHEMA_TYPES));

export function isPrimitiveTypeClass(typeClassName: string): boolean {
  return PRIMITIVE_TYPE_CLASSES.has(typeClassName);
}

function direction(isInput: boolean): string {
  return isInput ? 'input' : 'output';
}

// ── validateSchemaType ──────────────────────────────────────────────

export function validateSchemaType(
  schemaType: string,
  typeClassName: string,
  artifact: ArtifactHandle,
  isInput: boolean,
): void {
  const upper = schemaType.toUpperCase();

  if (Object.hasOwn(PRIMITIVE_SCHEMA_TYPES, upper)) {
    const required = PRIMITIVE_SCHEMA_TYPES[upper];
    if (required !== typeClassName) {
      throw new InvalidConfigurationError(
        `Schema type ${schemaType} expects ${required} but the function ${direction(isInput)} type is ${typeClassName}`,
      );
    }
    return;
  }

  if (STRUCT_SCHEMA_TYPES.has(upper)) {
    if (isPrimitiveTypeClass(typeClassName)) {
      throw new InvalidConfigurationError(
        `Schema type ${schemaType} cannot be used with primitive ${direction(isInput)} type ${typeClassName}`,
      );
    }
    return;
  }

  if (!artifact.hasClass(schemaType)) {
    throw new InvalidConfigurationError(`The schema class ${schemaType} does not exist`);
  }
}

// ── validateSerdeClass ──────────────────────────────────────────────

export function validateSerdeClass(
  serdeClassName: string,
  typeClassName: string,
  artifact: ArtifactHandle,
  isInput: boolean,
): void {
  if (serdeClassName === DEFAULT_SERDE_CLASS) {
    if (!isPrimitiveTypeClass(typeClassName)) {
      throw new InvalidConfigurationError(
        `The default SerDe does not support ${direction(isInput)} type ${typeClassName}`,
      );
    }
    return;
  }

  if (!artifact.hasClass(serdeClassName)) {
    throw new InvalidConfigurationError(`The SerDe class ${serdeClassName} does not exist`);
  }
}
