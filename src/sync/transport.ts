/**
 * Transport capability consumed by the connection.
 *
 * The connection only needs to open a socket, send text, read frames one at
 * a time and close. Production uses WsTransport; tests use an in-process
 * double with the same shape.
 */

export type Frame =
  | { type: 'text'; data: string }
  | { type: 'binary' }
  | { type: 'close'; code: number; reason: string };

export interface DeviceSocket {
  sendText(text: string): Promise<void>;
  /**
   * Next frame in arrival order. Once the socket has closed every call
   * returns the close frame. Rejects with AbortError when `signal` fires.
   */
  receive(signal?: AbortSignal): Promise<Frame>;
  close(): Promise<void>;
}

export interface DeviceTransport {
  open(url: string, signal?: AbortSignal): Promise<DeviceSocket>;
}
