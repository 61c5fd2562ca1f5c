/**
 * Compiled CompactRecord stencil.
 *
 * The SID paths come from the schema compiler that produced the data model;
 * this module only turns a layout into a nested map with placeholder leaves.
 */

import { TemplateError } from "./errors.ts";

/**
 * A CBOR map keyed by numeric schema identifiers (SIDs).
 */
export interface CompactRecord extends Map<number, CompactValue> {}

export type CompactValue =
  | string
  | number
  | boolean
  | null
  | CompactRecord
  | CompactValue[];

/**
 * SID paths of the two leaves a status record carries.
 */
export interface TemplateLayout {
  namePath: readonly number[];
  codePath: readonly number[];
}

export interface CompiledTemplate {
  /** Stencil with placeholder leaves. Never written to after compilation. */
  readonly record: CompactRecord;
  readonly namePath: readonly number[];
  readonly codePath: readonly number[];
}

export const NAME_PLACEHOLDER = "";
export const CODE_PLACEHOLDER = -1;

/** Root SID of the `fetch` operation in the car model. */
export const FETCH_SID = 60001;

/**
 * Layout of the `fetch` output: `carStatus/exteriorLight` and `carStatus/name`.
 */
export const CAR_STATUS_LAYOUT: TemplateLayout = {
  codePath: [FETCH_SID, 4, 1, 1],
  namePath: [FETCH_SID, 4, 1, 2],
};

function isPrefix(a: readonly number[], b: readonly number[]): boolean {
  return a.length <= b.length && a.every((key, i) => b[i] === key);
}

function setPath(record: CompactRecord, path: readonly number[], leaf: CompactValue): void {
  let node = record;
  for (const key of path.slice(0, -1)) {
    const existing = node.get(key);
    if (existing instanceof Map) {
      node = existing;
      continue;
    }
    const child: CompactRecord = new Map();
    node.set(key, child);
    node = child;
  }
  node.set(path[path.length - 1], leaf);
}

/**
 * Build the stencil for a layout.
 *
 * @throws TemplateError if a path is empty or the two paths overlap
 */
export function compileTemplate(layout: TemplateLayout): CompiledTemplate {
  const { namePath, codePath } = layout;

  if (namePath.length === 0 || codePath.length === 0) {
    throw new TemplateError("Template paths must not be empty");
  }
  if (isPrefix(namePath, codePath) || isPrefix(codePath, namePath)) {
    throw new TemplateError(
      `Template paths overlap: [${namePath.join(", ")}] and [${codePath.join(", ")}]`
    );
  }

  const record: CompactRecord = new Map();
  setPath(record, namePath, NAME_PLACEHOLDER);
  setPath(record, codePath, CODE_PLACEHOLDER);

  return Object.freeze({
    record,
    namePath: Object.freeze([...namePath]),
    codePath: Object.freeze([...codePath]),
  });
}

export const DEFAULT_TEMPLATE: CompiledTemplate = compileTemplate(CAR_STATUS_LAYOUT);
