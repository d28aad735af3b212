/**
 * Patch Engine
 *
 * Applies msoupdate operations to the mirrored document. Only `add` and
 * `replace` exist on this device and both simply set the value at the path:
 * the device never adds or removes structure at runtime, so any other op
 * means the stream no longer matches what this client understands.
 *
 * Path segments address mappings by key and sequences by integer index.
 */

import { PatchPathError, UnsupportedPatchOpError } from '../shared/errors';
import {
  isJsonArray,
  isJsonObject,
  type AppliedPatch,
  type JsonArray,
  type JsonObject,
  type JsonValue,
  type MsoPatchOp,
} from '../shared/mso-types';

export const SUPPORTED_PATCH_OPS = new Set(['add', 'replace']);

export function parsePath(path: string): string[] {
  if (!path.startsWith('/') || path.length < 2) {
    throw new PatchPathError(path, 'path must start with / and name a location');
  }
  return path.slice(1).split('/');
}

function parseIndex(segment: string): number | null {
  if (!/^\d+$/.test(segment)) return null;
  return Number(segment);
}

function child(node: JsonValue, segment: string): JsonValue | undefined {
  if (isJsonArray(node)) {
    const index = parseIndex(segment);
    return index === null ? undefined : node[index];
  }
  if (isJsonObject(node)) {
    return Object.prototype.hasOwnProperty.call(node, segment) ? node[segment] : undefined;
  }
  return undefined;
}

/**
 * Read the value at a path, or undefined when any segment does not resolve.
 */
export function getAtPath(doc: JsonValue, path: string): JsonValue | undefined {
  let node: JsonValue | undefined = doc;
  for (const segment of parsePath(path)) {
    if (node === undefined) return undefined;
    node = child(node, segment);
  }
  return node;
}

function resolveParent(doc: JsonValue, path: string, segments: string[]): JsonArray | JsonObject {
  let node: JsonValue | undefined = doc;
  for (const segment of segments) {
    node = node === undefined ? undefined : child(node, segment);
    if (node === undefined) {
      throw new PatchPathError(path, `no node at '${segment}'`);
    }
  }
  if (isJsonArray(node) || isJsonObject(node)) {
    return node;
  }
  throw new PatchPathError(path, 'parent is not a container');
}

export function assertSupportedOp(op: MsoPatchOp): void {
  if (!SUPPORTED_PATCH_OPS.has(op.op)) {
    throw new UnsupportedPatchOpError(op.op, op.path);
  }
}

/**
 * Apply a single add/replace op in place and report what changed.
 */
export function applyPatchOp(doc: JsonValue, op: MsoPatchOp): AppliedPatch {
  assertSupportedOp(op);

  const segments = parsePath(op.path);
  const last = segments.pop();
  if (last === undefined) {
    throw new PatchPathError(op.path, 'empty path');
  }
  const parent = resolveParent(doc, op.path, segments);

  if (isJsonArray(parent)) {
    const index = parseIndex(last);
    if (index === null || index > parent.length) {
      throw new PatchPathError(op.path, `'${last}' is not a valid index`);
    }
    const previous = parent[index];
    parent[index] = op.value;
    return { path: op.path, previous, value: op.value };
  }

  const previous = Object.prototype.hasOwnProperty.call(parent, last) ? parent[last] : undefined;
  parent[last] = op.value;
  return { path: op.path, previous, value: op.value };
}
