/**
 * Error hierarchy for the device client.
 *
 * - ConnectionError: the session could not be (re)established, or there is no socket to send on
 * - TransactionError / LookupError: caller usage errors, surfaced synchronously and never retried
 * - UnsupportedPatchOpError / PatchPathError / ProtocolError: the device stream did not match
 *   the expected protocol
 * - DeviceStateError: an accessor could not read a value of the expected type
 */

export class Htp1Error extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'Htp1Error';
  }
}

export class ConnectionError extends Htp1Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class TransactionError extends Htp1Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransactionError';
  }
}

export class LookupError extends Htp1Error {
  constructor(message: string) {
    super(message);
    this.name = 'LookupError';
  }
}

export class UnsupportedPatchOpError extends Htp1Error {
  readonly op: string;

  constructor(op: string, path: string) {
    super(`unsupported patch operation '${op}' at ${path}`);
    this.name = 'UnsupportedPatchOpError';
    this.op = op;
  }
}

export class PatchPathError extends Htp1Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`cannot resolve ${path}: ${reason}`);
    this.name = 'PatchPathError';
    this.path = path;
  }
}

export class ProtocolError extends Htp1Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export class DeviceStateError extends Htp1Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeviceStateError';
  }
}

/** Raised by abortable waits when their signal fires. */
export class AbortError extends Error {
  constructor(message = 'operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
