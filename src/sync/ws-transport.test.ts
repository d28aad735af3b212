import { EventEmitter } from 'node:events';
import { afterEach, describe, it, expect, vi } from 'vitest';
import WebSocket from 'ws';
import { WsDeviceSocket, WsTransport, rawDataToString, type WebSocketLike } from './ws-transport';
import { ConnectionError, isAbortError } from '../shared/errors';

const URL = 'ws://192.0.2.10/ws/controller';

class FakeWebSocket extends EventEmitter implements WebSocketLike {
  readyState: number = WebSocket.CONNECTING;
  readonly sent: string[] = [];
  readonly closeCalls: Array<[number | undefined, string | undefined]> = [];
  terminated = false;
  /** When false, close() does not complete the close handshake */
  answerClose = true;
  sendError: Error | null = null;

  send(data: string, cb?: (err?: Error) => void): void {
    if (this.sendError) {
      cb?.(this.sendError);
      return;
    }
    this.sent.push(data);
    cb?.();
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push([code, reason]);
    this.readyState = WebSocket.CLOSING;
    if (this.answerClose) {
      this.finishClose(code ?? 1005, reason ?? '');
    }
  }

  terminate(): void {
    this.terminated = true;
    this.finishClose(1006, '');
  }

  // Test controls

  serverOpen(): void {
    this.readyState = WebSocket.OPEN;
    this.emit('open');
  }

  serverText(text: string): void {
    this.emit('message', Buffer.from(text), false);
  }

  serverBinary(): void {
    this.emit('message', Buffer.from([1, 2, 3]), true);
  }

  finishClose(code: number, reason: string): void {
    this.readyState = WebSocket.CLOSED;
    this.emit('close', code, Buffer.from(reason));
  }
}

function openSocket(): { fake: FakeWebSocket; socket: WsDeviceSocket } {
  const fake = new FakeWebSocket();
  fake.readyState = WebSocket.OPEN;
  return { fake, socket: new WsDeviceSocket(fake) };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('rawDataToString', () => {
  it('decodes every shape ws delivers', () => {
    const arrayBuffer = new ArrayBuffer(3);
    new Uint8Array(arrayBuffer).set([104, 105, 33]);

    expect(rawDataToString(Buffer.from('mso {}'))).toBe('mso {}');
    expect(rawDataToString([Buffer.from('msoup'), Buffer.from('date []')])).toBe('msoupdate []');
    expect(rawDataToString(arrayBuffer)).toBe('hi!');
  });
});

describe('WsTransport.open', () => {
  it('resolves with a socket once the handshake completes', async () => {
    const fake = new FakeWebSocket();
    const created: Array<{ url: string; handshakeTimeout: number }> = [];
    const transport = new WsTransport({
      connectTimeoutMs: 2500,
      createSocket: (url, options) => {
        created.push({ url, handshakeTimeout: options.handshakeTimeout });
        return fake;
      },
    });

    const pending = transport.open(URL);
    fake.serverOpen();
    const socket = await pending;
    await socket.sendText('getmso');

    expect(created).toEqual([{ url: URL, handshakeTimeout: 2500 }]);
    expect(fake.sent).toEqual(['getmso']);
  });

  it('rejects with ConnectionError on a socket error', async () => {
    const fake = new FakeWebSocket();
    const transport = new WsTransport({ createSocket: () => fake });

    const pending = transport.open(URL);
    fake.emit('error', new Error('connect ECONNREFUSED'));

    await expect(pending).rejects.toThrow(new ConnectionError(`failed to open ${URL}`));
  });

  it('rejects with ConnectionError when closed during the handshake', async () => {
    const fake = new FakeWebSocket();
    const transport = new WsTransport({ createSocket: () => fake });

    const pending = transport.open(URL);
    fake.finishClose(1006, '');

    await expect(pending).rejects.toThrow(`${URL} closed during handshake (1006)`);
  });

  it('terminates the socket and rejects with AbortError when aborted', async () => {
    const fake = new FakeWebSocket();
    const transport = new WsTransport({ createSocket: () => fake });
    const abort = new AbortController();

    const pending = transport.open(URL, abort.signal);
    abort.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
    expect(fake.terminated).toBe(true);
  });

  it('does not create a socket for an already aborted signal', async () => {
    const createSocket = vi.fn(() => new FakeWebSocket());
    const transport = new WsTransport({ createSocket });
    const abort = new AbortController();
    abort.abort();

    const err = await transport.open(URL, abort.signal).catch((e: unknown) => e);

    expect(isAbortError(err)).toBe(true);
    expect(createSocket).not.toHaveBeenCalled();
  });
});

describe('WsDeviceSocket', () => {
  it('delivers frames in arrival order', async () => {
    const { fake, socket } = openSocket();

    fake.serverText('mso {"volume":-40}');
    fake.serverBinary();
    fake.serverText('msoupdate []');

    expect(await socket.receive()).toEqual({ type: 'text', data: 'mso {"volume":-40}' });
    expect(await socket.receive()).toEqual({ type: 'binary' });
    expect(await socket.receive()).toEqual({ type: 'text', data: 'msoupdate []' });
  });

  it('wakes a pending receive when a frame arrives', async () => {
    const { fake, socket } = openSocket();

    const pending = socket.receive();
    fake.serverText('msoupdate []');

    expect(await pending).toEqual({ type: 'text', data: 'msoupdate []' });
  });

  it('returns the close frame after the queue drains, every time', async () => {
    const { fake, socket } = openSocket();

    fake.serverText('msoupdate []');
    fake.finishClose(1001, 'going away');

    expect(await socket.receive()).toEqual({ type: 'text', data: 'msoupdate []' });
    expect(await socket.receive()).toEqual({ type: 'close', code: 1001, reason: 'going away' });
    expect(await socket.receive()).toEqual({ type: 'close', code: 1001, reason: 'going away' });
  });

  it('rejects a pending receive with AbortError', async () => {
    const { socket } = openSocket();
    const abort = new AbortController();

    const pending = socket.receive(abort.signal);
    abort.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
  });

  it('refuses to send when the socket is not open', async () => {
    const { fake, socket } = openSocket();
    fake.readyState = WebSocket.CLOSING;

    await expect(socket.sendText('getmso')).rejects.toThrow('socket is not open');
    expect(fake.sent).toEqual([]);
  });

  it('surfaces send failures as ConnectionError', async () => {
    const { fake, socket } = openSocket();
    fake.sendError = new Error('write EPIPE');

    await expect(socket.sendText('getmso')).rejects.toBeInstanceOf(ConnectionError);
  });

  it('closes with a normal close code, once', async () => {
    const { fake, socket } = openSocket();

    await socket.close();
    await socket.close();

    expect(fake.closeCalls).toEqual([[1000, 'Client disconnect']]);
    expect(fake.terminated).toBe(false);
  });

  it('terminates when the close handshake does not complete', async () => {
    vi.useFakeTimers();
    const { fake, socket } = openSocket();
    fake.answerClose = false;

    const closing = socket.close();
    await vi.advanceTimersByTimeAsync(1000);
    await closing;

    expect(fake.terminated).toBe(true);
  });
});
