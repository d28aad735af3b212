/**
 * A resettable one-shot signal: wait() resolves once set() has been called,
 * and keeps resolving immediately until clear().
 */

import { AbortError } from '../shared/errors';

export class TimeoutError extends Error {
  constructor(ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export class Latch {
  private isSetFlag = false;
  private waiters = new Set<() => void>();

  get isSet(): boolean {
    return this.isSetFlag;
  }

  set(): void {
    if (this.isSetFlag) return;
    this.isSetFlag = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    waiters.forEach((wake) => wake());
  }

  clear(): void {
    this.isSetFlag = false;
  }

  /**
   * Resolve when the latch is set. Rejects with TimeoutError after `timeoutMs`
   * (when given) or AbortError when `signal` fires first.
   */
  wait(options: { timeoutMs?: number; signal?: AbortSignal } = {}): Promise<void> {
    const { timeoutMs, signal } = options;
    if (this.isSetFlag) return Promise.resolve();
    if (signal?.aborted) return Promise.reject(new AbortError());

    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const finish = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiters.delete(wake);
      };
      const wake = () => {
        finish();
        resolve();
      };
      const onAbort = () => {
        finish();
        reject(new AbortError());
      };

      this.waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          finish();
          reject(new TimeoutError(timeoutMs));
        }, timeoutMs);
      }
    });
  }
}
