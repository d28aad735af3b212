/**
 * DeviceTransport on top of the `ws` package.
 *
 * ws is event driven; the connection wants to pull one frame at a time.
 * WsDeviceSocket bridges the two with a frame queue: events push frames,
 * receive() takes the oldest one or waits for the next.
 */

import WebSocket from 'ws';
import { AbortError, ConnectionError } from '../shared/errors';
import { logger } from '../utils/logger';
import type { DeviceSocket, DeviceTransport, Frame } from './transport';

// Close handshake grace period before the socket is torn down hard
const CLOSE_TIMEOUT_MS = 1000;

/**
 * The subset of ws.WebSocket the transport uses.
 */
export interface WebSocketLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type WebSocketFactory = (url: string, options: { handshakeTimeout: number }) => WebSocketLike;

const createWebSocket: WebSocketFactory = (url, options) => new WebSocket(url, options);

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class WsDeviceSocket implements DeviceSocket {
  private frames: Frame[] = [];
  private waiters: Array<(frame: Frame) => void> = [];
  private closeFrame: Frame | null = null;
  private closeWaiters: Array<() => void> = [];

  constructor(private readonly ws: WebSocketLike) {
    ws.on('message', (data, isBinary) => {
      this.push(isBinary ? { type: 'binary' } : { type: 'text', data: rawDataToString(data) });
    });
    ws.on('close', (code, reason) => {
      logger.ws.log('Closed:', code, reason.toString());
      const frame: Frame = { type: 'close', code, reason: reason.toString() };
      this.closeFrame = frame;
      this.push(frame);
      // Anyone still waiting after the queue drained sees the close as well
      this.waiters.splice(0).forEach((wake) => wake(frame));
      this.closeWaiters.splice(0).forEach((done) => done());
    });
    ws.on('error', (err) => {
      logger.ws.warn('Error:', err.message);
    });
  }

  private push(frame: Frame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
    } else {
      this.frames.push(frame);
    }
  }

  sendText(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new ConnectionError('socket is not open'));
        return;
      }
      this.ws.send(text, (err) => {
        if (err) {
          reject(new ConnectionError('send failed', { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(signal?: AbortSignal): Promise<Frame> {
    const queued = this.frames.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closeFrame) return Promise.resolve(this.closeFrame);
    if (signal?.aborted) return Promise.reject(new AbortError());

    return new Promise((resolve, reject) => {
      const waiter = (frame: Frame) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(frame);
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(new AbortError());
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): Promise<void> {
    if (this.closeFrame || this.ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => this.ws.terminate(), CLOSE_TIMEOUT_MS);
      this.closeWaiters.push(() => {
        clearTimeout(timer);
        resolve();
      });
      this.ws.close(1000, 'Client disconnect');
    });
  }
}

export interface WsTransportOptions {
  /** Handshake timeout in ms (default: 10000) */
  connectTimeoutMs?: number;
  /** Socket constructor, replaceable for tests */
  createSocket?: WebSocketFactory;
}

export class WsTransport implements DeviceTransport {
  private readonly connectTimeoutMs: number;
  private readonly createSocket: WebSocketFactory;

  constructor(options: WsTransportOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
    this.createSocket = options.createSocket ?? createWebSocket;
  }

  open(url: string, signal?: AbortSignal): Promise<DeviceSocket> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortError());
        return;
      }

      logger.ws.log('Connecting to', url);
      let settled = false;
      const ws = this.createSocket(url, { handshakeTimeout: this.connectTimeoutMs });
      // Listeners go on before the handshake finishes so no early frame is lost
      const socket = new WsDeviceSocket(ws);

      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        outcome();
      };
      const onAbort = () => {
        settle(() => {
          ws.terminate();
          reject(new AbortError());
        });
      };

      ws.on('open', () => {
        logger.ws.log('Connected');
        settle(() => resolve(socket));
      });
      ws.on('error', (err) => {
        settle(() => reject(new ConnectionError(`failed to open ${url}`, { cause: err })));
      });
      ws.on('close', (code) => {
        settle(() => reject(new ConnectionError(`${url} closed during handshake (${code})`)));
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
