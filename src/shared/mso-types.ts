/**
 * Shapes of the mirrored device document (the "mso").
 *
 * The client never models the device schema: the mso is an arbitrary JSON
 * tree, and accessors narrow the few values they read with the guards below.
 */

export type JsonPrimitive = null | boolean | number | string;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/** The device's full configuration document */
export type MsoDocument = JsonObject;

/** Patch operation as it appears on the wire */
export interface MsoPatchOp {
  op: string;
  path: string;
  value: JsonValue;
}

/** Outbound change, always sent as a replace */
export interface MsoChangeOp {
  op: 'replace';
  path: string;
  value: JsonValue;
}

/** Result of applying one patch op to the mirror */
export interface AppliedPatch {
  path: string;
  previous: JsonValue | undefined;
  value: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: unknown): value is JsonArray {
  return Array.isArray(value);
}

/**
 * Narrow an unknown (e.g. JSON.parse output) to a JsonValue.
 * JSON.parse can only produce these shapes, so this walks the tree once.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}
