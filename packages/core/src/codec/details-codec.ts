/**
 * Details codec: wire encoding of FunctionDetails for submission to the
 * runtime. The message schema lives in proto/function.proto and is loaded
 * once, on first use.
 */
import { createRequire } from 'node:module';
import protobuf from 'protobufjs';
import type { Type } from 'protobufjs';
import type { FunctionDetails } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { parseFunctionDetails } from '../core/parse.js';

// Resolved through the package exports: src/ and dist/ sit at different depths.
export const FUNCTION_PROTO_PATH = createRequire(import.meta.url).resolve('@fnconfig/core/proto/function.proto');

const MESSAGE_NAME = 'fnconfig.v1.FunctionDetails';

let detailsType: Type | undefined;

function functionDetailsType(): Type {
  if (!detailsType) {
    detailsType = protobuf.loadSync(FUNCTION_PROTO_PATH).lookupType(MESSAGE_NAME);
  }
  return detailsType;
}

// ── Public API ──────────────────────────────────────────────────────

export function encodeFunctionDetails(details: FunctionDetails): Uint8Array {
  const type = functionDetailsType();
  const message = type.fromObject({ ...details });
  return type.encode(message).finish();
}

/**
 * Decode wire bytes back into a descriptor. Fields left at their zero value
 * on the wire come back as the descriptor defaults.
 */
export function decodeFunctionDetails(bytes: Uint8Array): FunctionDetails {
  const type = functionDetailsType();
  let decoded: Record<string, unknown>;
  try {
    decoded = type.toObject(type.decode(bytes), {
      enums: String,
      longs: Number,
      defaults: false,
    });
  } catch (err) {
    throw new Error(`Malformed function details: ${errorMessage(err)}`, { cause: err });
  }
  return parseFunctionDetails(decoded);
}
