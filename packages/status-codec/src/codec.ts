/**
 * CBOR codec for status records.
 *
 * Maps are decoded as `Map` so integer SIDs keep their type on the way back.
 */

import { Encoder } from "cbor-x";
import { DecodeError, TemplateError } from "./errors.ts";
import {
  lookupCodeForStatus,
  statusForCode,
  type LightStatus,
  type StatusEnvelope,
} from "./light-status.ts";
import {
  DEFAULT_TEMPLATE,
  type CompactRecord,
  type CompactValue,
  type CompiledTemplate,
} from "./template.ts";

const cbor = new Encoder({ mapsAsObjects: false, useRecords: false });

function childOf(node: unknown, key: number): unknown {
  if (node instanceof Map) {
    return node.get(key);
  }
  if (Array.isArray(node)) {
    return node[key];
  }
  return undefined;
}

function readPath(root: unknown, path: readonly number[]): unknown {
  let node = root;
  for (const key of path) {
    node = childOf(node, key);
    if (node === undefined) {
      return undefined;
    }
  }
  return node;
}

function writeLeaf(record: CompactRecord, path: readonly number[], value: CompactValue): void {
  const parent = readPath(record, path.slice(0, -1));
  const key = path[path.length - 1];

  if (parent instanceof Map) {
    parent.set(key, value);
  } else if (Array.isArray(parent)) {
    parent[key] = value;
  } else {
    throw new TemplateError(`Template has no container at [${path.join(", ")}]`);
  }
}

/**
 * Produce a record for `name`/`status` from the template.
 *
 * Works on a private copy of the stencil, so concurrent callers sharing one
 * template never see each other's leaves.
 *
 * @throws UnknownStatusError if `status` is not a light status name
 */
export function encode(
  template: CompiledTemplate,
  name: string,
  status: string
): CompactRecord {
  const code = lookupCodeForStatus(status);
  const record = structuredClone(template.record);
  writeLeaf(record, template.namePath, name);
  writeLeaf(record, template.codePath, code);
  return record;
}

/**
 * Encode a record for `name`/`status` straight to CBOR bytes.
 */
export function encodeStatus(
  template: CompiledTemplate,
  name: string,
  status: LightStatus
): Uint8Array {
  return encodeCompact(encode(template, name, status));
}

/**
 * Encode any compact value to CBOR bytes.
 */
export function encodeCompact(value: CompactValue): Uint8Array {
  return cbor.encode(value);
}

/**
 * Read a status envelope out of CBOR bytes.
 *
 * @throws DecodeError if the bytes are not CBOR, a leaf is missing or mistyped,
 * or the status code is outside the table
 */
export function decode(
  bytes: Uint8Array,
  template: CompiledTemplate = DEFAULT_TEMPLATE
): StatusEnvelope {
  let root: unknown;
  try {
    root = cbor.decode(bytes);
  } catch (err) {
    throw new DecodeError(
      `Malformed CBOR payload: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (!(root instanceof Map)) {
    throw new DecodeError("Expected a CBOR map at the top level");
  }

  const code = readPath(root, template.codePath);
  if (code === undefined) {
    throw new DecodeError(`Missing status code leaf at [${template.codePath.join(", ")}]`);
  }
  if (typeof code !== "number") {
    throw new DecodeError(`Status code leaf is not an integer: ${typeof code}`);
  }

  const name = readPath(root, template.namePath);
  if (typeof name !== "string") {
    throw new DecodeError(`Missing name leaf at [${template.namePath.join(", ")}]`);
  }

  return { name, status: statusForCode(code) };
}
