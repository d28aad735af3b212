/**
 * Transaction: a batch of pending writes for one device.
 *
 * Writes are visible to readers of the owning connection as soon as they are
 * set, and go to the device as a single `changemso` on commit(). Commit does
 * not wait for the device: its msoupdate echo is what updates the mirror and
 * notifies subscribers. Pending writes are cleared at commit, so between the
 * commit and the echo readers see the mirror's previous value again.
 *
 * Leaving a transaction without committing (discard()) drops its writes.
 * Nothing is flushed implicitly.
 */

import { TransactionError } from '../shared/errors';
import { buildChangeOps } from '../shared/messages';
import type { JsonValue, MsoChangeOp } from '../shared/mso-types';
import { logger } from '../utils/logger';

/**
 * What a transaction needs from the connection that opened it.
 */
export interface TransactionHost {
  sendChanges(ops: MsoChangeOp[]): Promise<void>;
  releaseTransaction(tx: Transaction): void;
}

export class Transaction {
  private pending = new Map<string, JsonValue>();
  private open = true;

  constructor(private readonly host: TransactionHost) {}

  get isOpen(): boolean {
    return this.open;
  }

  /** Number of pending writes */
  get size(): number {
    return this.pending.size;
  }

  has(path: string): boolean {
    return this.pending.has(path);
  }

  get(path: string): JsonValue | undefined {
    return this.pending.get(path);
  }

  set(path: string, value: JsonValue): void {
    this.assertOpen();
    this.pending.set(path, value);
  }

  /**
   * Send all pending writes as one changemso.
   * @returns false when there was nothing to send
   */
  async commit(): Promise<boolean> {
    this.assertOpen();
    logger.tx.log(`commit: ${this.pending.size} pending`);
    if (this.pending.size === 0) {
      return false;
    }

    await this.host.sendChanges(buildChangeOps(this.pending));
    this.pending.clear();
    return true;
  }

  /**
   * Drop pending writes and release the connection's transaction slot.
   * Safe to call more than once.
   */
  discard(): void {
    if (!this.open) return;
    if (this.pending.size > 0) {
      logger.tx.log(`discard: dropping ${this.pending.size} uncommitted write(s)`);
    }
    this.open = false;
    this.pending.clear();
    this.host.releaseTransaction(this);
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new TransactionError('transaction is no longer open');
    }
  }
}
