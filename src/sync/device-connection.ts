/**
 * Device connection manager
 *
 * Keeps a mirror of the device's mso in sync over one websocket:
 * - connect(): open the socket, request the mso, wait until it arrives
 * - a receive loop that applies msoupdate patches and notifies subscribers
 * - tryConnect(): a supervised reconnect loop with exponential backoff,
 *   re-armed automatically whenever the device closes the socket
 * - transactions for batched writes, flushed as one changemso
 *
 * Only the receive loop writes to the mirror, so readers never see a
 * document that is half replaced.
 */

import {
  resolveClientConfig,
  type ClientConfig,
} from '../config/client-config';
import {
  AbortError,
  ConnectionError,
  DeviceStateError,
  ProtocolError,
  TransactionError,
  isAbortError,
} from '../shared/errors';
import {
  COMMAND_GET_MSO,
  COMMAND_MSO,
  COMMAND_MSO_UPDATE,
  controllerUrl,
  decodePayload,
  encodeChangeMso,
  normalizePatchOps,
  parseFrame,
  type InboundCommand,
} from '../shared/messages';
import {
  isJsonObject,
  type JsonValue,
  type MsoChangeOp,
  type MsoDocument,
} from '../shared/mso-types';
import { Latch } from '../utils/latch';
import { logger, truncateForLog } from '../utils/logger';
import { ReconnectBackoff, sleep as defaultSleep, type SleepFn } from '../utils/retry';
import { applyPatchOp, assertSupportedOp, getAtPath } from './patch';
import { CONNECTION_SUBJECT, SubscriptionRegistry, type Subscriber } from './subscriptions';
import { Transaction, type TransactionHost } from './transaction';
import type { DeviceSocket, DeviceTransport } from './transport';
import { WsTransport } from './ws-transport';

export type ConnectionStatus = 'disconnected' | 'connecting' | 'ready';

export type HandlerErrorCallback = (error: unknown, command: string) => void;

export interface DeviceConnectionOptions
  extends Partial<Omit<ClientConfig, 'host' | 'debug'>> {
  /** Socket provider (default: WsTransport over the `ws` package) */
  transport?: DeviceTransport;
  /** Backoff sleep, replaceable for tests */
  sleep?: SleepFn;
  /** Called after a command handler fault has been logged; the loop keeps running */
  onHandlerError?: HandlerErrorCallback;
}

type CommandHandler = (payload: JsonValue) => Promise<void>;

interface ConnectAttempt {
  abort: AbortController;
  /** Resolves once the attempt has finished, whatever the outcome */
  settled: Promise<void>;
}

function isInboundCommand(
  handlers: Record<InboundCommand, CommandHandler>,
  command: string
): command is InboundCommand {
  return Object.prototype.hasOwnProperty.call(handlers, command);
}

export class DeviceConnection implements TransactionHost {
  readonly host: string;

  private readonly config: Omit<ClientConfig, 'host' | 'debug'>;
  private readonly transport: DeviceTransport;
  private readonly sleep: SleepFn;
  private readonly onHandlerError: HandlerErrorCallback | null;
  private readonly subscriptions = new SubscriptionRegistry();
  private readonly backoff: ReconnectBackoff;

  // socket + receive loop
  private socket: DeviceSocket | null = null;
  private receiveTask: Promise<void> | null = null;
  private receiveAbort: AbortController | null = null;

  // reconnect supervisor
  private reconnectTask: Promise<void> | null = null;
  private reconnectAbort: AbortController | null = null;
  private shouldConnect = false;

  // state
  private mso: MsoDocument | null = null;
  private readonly msoReady = new Latch();
  private transaction: Transaction | null = null;
  private connecting = false;
  private readonly connectAttempts = new Set<ConnectAttempt>();

  // Closed set of inbound commands; anything else is ignored
  private readonly handlers: Record<InboundCommand, CommandHandler> = {
    [COMMAND_MSO]: (payload) => this.handleMso(payload),
    [COMMAND_MSO_UPDATE]: (payload) => this.handleMsoUpdate(payload),
  };

  constructor(host: string, options: DeviceConnectionOptions = {}) {
    this.host = host;
    this.config = resolveClientConfig(options);
    this.transport =
      options.transport ?? new WsTransport({ connectTimeoutMs: this.config.connectTimeoutMs });
    this.sleep = options.sleep ?? defaultSleep;
    this.onHandlerError = options.onHandlerError ?? null;
    this.backoff = new ReconnectBackoff({
      baseDelayMs: this.config.reconnectInitialDelayMs,
      maxDelayMs: this.config.reconnectMaxDelayMs,
      jitterFactor: this.config.reconnectJitterFactor,
    });
  }

  // ============================================================================
  // Status
  // ============================================================================

  /** True once the socket is open and the full mso has been received */
  get connected(): boolean {
    return this.msoReady.isSet;
  }

  get status(): ConnectionStatus {
    if (this.msoReady.isSet) return 'ready';
    return this.connecting ? 'connecting' : 'disconnected';
  }

  /** Whether the reconnect supervisor is currently running */
  get reconnecting(): boolean {
    return this.reconnectTask !== null;
  }

  /** Delay the supervisor would wait after its next failed attempt */
  get reconnectDelayMs(): number {
    return this.backoff.currentDelayMs;
  }

  /** The mirrored document, or null before the first mso */
  get state(): Readonly<MsoDocument> | null {
    return this.mso;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Connect and wait for the initial mso.
   * @throws ConnectionError on transport failure, timeout or abort
   */
  async connect(signal?: AbortSignal): Promise<void> {
    // Each attempt has its own controller so stop() can cancel attempts it did not start
    const abort = new AbortController();
    const onCallerAbort = () => abort.abort();
    if (signal?.aborted) {
      abort.abort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const task = this.openSession(abort.signal);
    const attempt: ConnectAttempt = {
      abort,
      settled: task.then(
        () => undefined,
        () => undefined
      ),
    };
    this.connectAttempts.add(attempt);
    try {
      await task;
    } finally {
      this.connectAttempts.delete(attempt);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async openSession(signal: AbortSignal): Promise<void> {
    this.reset();
    this.connecting = true;

    const url = controllerUrl(this.host);
    logger.connection.log(`connect: url=${url}`);

    try {
      // A previous socket may still be attached when connect() is called directly
      await this.disconnect();

      const socket = await this.transport.open(url, signal);
      this.socket = socket;
      if (signal.aborted) {
        throw new AbortError();
      }
      this.startReceiving(socket);

      logger.connection.log('connect: requesting mso');
      await socket.sendText(COMMAND_GET_MSO);

      await this.msoReady.wait({ timeoutMs: this.config.msoTimeoutMs, signal });
    } catch (err) {
      logger.connection.warn('connect: failed to connect and retrieve mso', err);
      await this.disconnect();
      this.reset();
      throw err instanceof ConnectionError
        ? err
        : new ConnectionError(`could not connect to ${this.host}`, { cause: err });
    } finally {
      this.connecting = false;
    }

    logger.connection.log('connect: received mso, ready');
    this.backoff.reset();
    await this.subscriptions.notify(CONNECTION_SUBJECT);
  }

  /**
   * Start persistently trying to connect in the background. Returns at once;
   * a supervisor that is already running is left alone.
   */
  tryConnect(): void {
    this.shouldConnect = true;
    if (this.reconnectTask) {
      logger.connection.log('tryConnect: supervisor already running');
      return;
    }

    const abort = new AbortController();
    this.reconnectAbort = abort;
    this.reconnectTask = this.reconnectLoop(abort.signal).finally(() => {
      if (this.reconnectAbort === abort) {
        this.reconnectTask = null;
        this.reconnectAbort = null;
      }
    });
  }

  /**
   * Stop the reconnect supervisor and wait for it to exit.
   */
  async stopConnect(): Promise<void> {
    logger.connection.log('stopConnect:');
    this.shouldConnect = false;
    const task = this.reconnectTask;
    this.reconnectAbort?.abort();
    if (task) {
      await task;
    }
    logger.connection.log('stopConnect: done');
  }

  /**
   * Disconnect and shut down every background task, including connect() calls
   * still in flight. Safe to call repeatedly, including before any connect.
   */
  async stop(): Promise<void> {
    logger.connection.log('stop:');
    const attempts = [...this.connectAttempts];
    attempts.forEach((attempt) => attempt.abort.abort());
    await this.stopConnect();
    await Promise.all(attempts.map((attempt) => attempt.settled));
    await this.disconnect();
    this.reset();
  }

  subscribe(subject: string, callback: Subscriber): () => void {
    return this.subscriptions.subscribe(subject, callback);
  }

  // ============================================================================
  // Transactions
  // ============================================================================

  /**
   * Open the single transaction this connection allows.
   * @throws TransactionError when one is already open
   */
  beginTransaction(): Transaction {
    if (this.transaction) {
      throw new TransactionError('transaction already in progress');
    }
    const tx = new Transaction(this);
    this.transaction = tx;
    return tx;
  }

  /**
   * Run `fn` inside a transaction. The transaction is discarded when `fn`
   * settles, so anything not committed inside `fn` is dropped.
   */
  async transact<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    const tx = this.beginTransaction();
    try {
      return await fn(tx);
    } finally {
      tx.discard();
    }
  }

  get inTransaction(): boolean {
    return this.transaction !== null;
  }

  // Note: public for TransactionHost; call commit()/discard() on the transaction instead
  async sendChanges(ops: MsoChangeOp[]): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new ConnectionError('not connected');
    }
    const frame = encodeChangeMso(ops);
    logger.tx.log(`send: ${truncateForLog(frame)}`);
    await socket.sendText(frame);
  }

  releaseTransaction(tx: Transaction): void {
    if (this.transaction === tx) {
      this.transaction = null;
    }
  }

  // ============================================================================
  // State access
  // ============================================================================

  /**
   * Value at a path as a reader should see it: the open transaction's pending
   * write if there is one, otherwise the mirror.
   */
  valueAt(path: string): JsonValue | undefined {
    const tx = this.transaction;
    if (tx?.has(path)) {
      return tx.get(path);
    }
    return this.mirrorValueAt(path);
  }

  /** Value at a path in the mirror only, ignoring pending writes */
  protected mirrorValueAt(path: string): JsonValue | undefined {
    return this.mso === null ? undefined : getAtPath(this.mso, path);
  }

  /**
   * Record a pending write.
   * @throws TransactionError when no transaction is open
   */
  protected writeValue(path: string, value: JsonValue): void {
    if (!this.transaction) {
      throw new TransactionError('no transaction in progress');
    }
    this.transaction.set(path, value);
  }

  protected requireState(): MsoDocument {
    if (this.mso === null) {
      throw new DeviceStateError('device state is not available');
    }
    return this.mso;
  }

  // ============================================================================
  // Private: connection internals
  // ============================================================================

  private reset(): void {
    this.mso = null;
    this.transaction?.discard();
    this.transaction = null;
    this.msoReady.clear();
  }

  private async disconnect(): Promise<void> {
    const socket = this.socket;
    const task = this.receiveTask;
    const abort = this.receiveAbort;
    this.socket = null;
    this.receiveTask = null;
    this.receiveAbort = null;

    // Stop the loop first so our own close is not taken for a lost connection
    abort?.abort();
    if (socket) {
      logger.connection.log('disconnect: closing socket');
      try {
        await socket.close();
      } catch (err) {
        logger.connection.warn('disconnect: close failed', err);
      }
    }
    if (task) {
      await task;
    }
  }

  private async reconnectLoop(signal: AbortSignal): Promise<void> {
    logger.connection.log('reconnect: started');
    this.backoff.reset();
    try {
      while (this.shouldConnect && !signal.aborted) {
        try {
          await this.connect(signal);
          logger.connection.log('reconnect: connected');
          return;
        } catch (err) {
          if (!(err instanceof ConnectionError)) throw err;
          if (!this.shouldConnect || signal.aborted) return;

          const delay = this.backoff.next();
          logger.connection.log(
            `reconnect: failed, retrying in ${delay}ms (attempt ${this.backoff.attempts})`
          );
          await this.sleep(delay, signal);
        }
      }
    } catch (err) {
      if (!isAbortError(err)) {
        logger.connection.error('reconnect: supervisor stopped unexpectedly', err);
      }
    } finally {
      logger.connection.log('reconnect: exited loop');
    }
  }

  private startReceiving(socket: DeviceSocket): void {
    const abort = new AbortController();
    this.receiveAbort = abort;
    this.receiveTask = this.receiveLoop(socket, abort.signal);
  }

  private async receiveLoop(socket: DeviceSocket, signal: AbortSignal): Promise<void> {
    logger.receive.log('loop started');
    try {
      while (!signal.aborted) {
        const frame = await socket.receive(signal);
        if (signal.aborted) return;

        if (frame.type === 'close') {
          await this.handleConnectionLost(socket, `closed by device (${frame.code})`);
          return;
        }
        if (frame.type !== 'text') {
          // not interested
          continue;
        }
        await this.dispatch(frame.data);
      }
    } catch (err) {
      if (!isAbortError(err) && !signal.aborted) {
        logger.receive.error('receive failed', err);
        await this.handleConnectionLost(socket, 'receive failed');
      }
    } finally {
      logger.receive.log('loop exited');
    }
  }

  private async handleConnectionLost(socket: DeviceSocket, reason: string): Promise<void> {
    logger.connection.warn(`connection lost: ${reason}`);
    if (this.socket === socket) {
      this.socket = null;
      this.receiveTask = null;
      this.receiveAbort = null;
    }
    this.msoReady.clear();

    this.tryConnect();
    await this.subscriptions.notify(CONNECTION_SUBJECT);
  }

  private async dispatch(text: string): Promise<void> {
    logger.receive.debug(`msg=${truncateForLog(text)}`);
    const { command, payload } = parseFrame(text);
    if (!isInboundCommand(this.handlers, command)) {
      return;
    }

    try {
      await this.handlers[command](decodePayload(payload));
    } catch (err) {
      // One bad message must not end the session: log it and keep reading
      logger.receive.error(`handler=${command} threw`, err);
      this.reportHandlerError(err, command);
    }
  }

  private reportHandlerError(err: unknown, command: string): void {
    if (!this.onHandlerError) return;
    try {
      this.onHandlerError(err, command);
    } catch (hookErr) {
      logger.receive.error('onHandlerError threw', hookErr);
    }
  }

  // ============================================================================
  // Command handlers
  // ============================================================================

  private async handleMso(payload: JsonValue): Promise<void> {
    if (!isJsonObject(payload)) {
      throw new ProtocolError('mso payload is not an object');
    }
    logger.receive.log('mso: payload=***');
    this.mso = payload;
    this.msoReady.set();
  }

  private async handleMsoUpdate(payload: JsonValue): Promise<void> {
    const mso = this.mso;
    if (mso === null) {
      throw new DeviceStateError('msoupdate received before mso');
    }

    const ops = normalizePatchOps(payload);
    logger.receive.log(`msoupdate: ${ops.length} op(s)`);

    // Op names are checked for the whole batch; paths resolve one op at a time
    ops.forEach(assertSupportedOp);

    for (const op of ops) {
      const applied = applyPatchOp(mso, op);
      logger.receive.debug(`msoupdate: path=${applied.path}`);
      await this.subscriptions.notify(applied.path, applied.value);
    }
  }
}
