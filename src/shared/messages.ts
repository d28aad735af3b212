/**
 * Controller Wire Protocol
 *
 * Text frames on ws://<host>/ws/controller, each `<command> <json-payload>`:
 *
 *   out  getmso                 request the full document
 *   in   mso <json>             full document
 *   in   msoupdate <json>       one patch op or an array of them
 *   out  changemso <json>       array of replace ops
 *
 * Only these helpers know the framing; the connection deals in parsed values.
 */

import { ProtocolError } from './errors';
import {
  isJsonArray,
  isJsonObject,
  isJsonValue,
  type JsonValue,
  type MsoChangeOp,
  type MsoPatchOp,
} from './mso-types';

export const COMMAND_GET_MSO = 'getmso';
export const COMMAND_MSO = 'mso';
export const COMMAND_MSO_UPDATE = 'msoupdate';
export const COMMAND_CHANGE_MSO = 'changemso';

/** Commands the device sends that the client acts on */
export type InboundCommand = typeof COMMAND_MSO | typeof COMMAND_MSO_UPDATE;

export const CONTROLLER_PATH = '/ws/controller';

export function controllerUrl(host: string): string {
  return `ws://${host}${CONTROLLER_PATH}`;
}

export interface ParsedFrame {
  command: string;
  payload: string;
}

/**
 * Split a text frame on its first space.
 * A frame without a space is a bare command with an empty payload.
 */
export function parseFrame(text: string): ParsedFrame {
  const space = text.indexOf(' ');
  if (space === -1) {
    return { command: text, payload: '' };
  }
  return { command: text.slice(0, space), payload: text.slice(space + 1) };
}

export function decodePayload(payload: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (err) {
    throw new ProtocolError('payload is not valid JSON', { cause: err });
  }
  if (!isJsonValue(parsed)) {
    throw new ProtocolError('payload is not a JSON value');
  }
  return parsed;
}

/**
 * Accept one op object or an array of them, as msoupdate may carry either.
 */
export function normalizePatchOps(payload: JsonValue): MsoPatchOp[] {
  const pieces = isJsonArray(payload) ? payload : [payload];
  return pieces.map((piece, index) => {
    if (!isJsonObject(piece)) {
      throw new ProtocolError(`patch op ${index} is not an object`);
    }
    const { op, path, value } = piece;
    if (typeof op !== 'string') {
      throw new ProtocolError(`patch op ${index} has no 'op'`);
    }
    if (typeof path !== 'string' || !path.startsWith('/')) {
      throw new ProtocolError(`patch op ${index} has an invalid path`);
    }
    return { op, path, value: value ?? null };
  });
}

export function buildChangeOps(changes: Iterable<[string, JsonValue]>): MsoChangeOp[] {
  return Array.from(changes, ([path, value]) => ({ op: 'replace' as const, path, value }));
}

export function encodeChangeMso(ops: MsoChangeOp[]): string {
  // JSON.stringify without a spacer is already compact
  return `${COMMAND_CHANGE_MSO} ${JSON.stringify(ops)}`;
}
