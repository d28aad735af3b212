import { describe, it, expect, vi } from 'vitest';
import { CONNECTION_SUBJECT, SubscriptionRegistry } from './subscriptions';
import type { JsonValue } from '../shared/mso-types';

describe('SubscriptionRegistry', () => {
  it('notifies subscribers of a subject in registration order', async () => {
    const registry = new SubscriptionRegistry();
    const calls: string[] = [];
    registry.subscribe('/volume', () => {
      calls.push('first');
    });
    registry.subscribe('/volume', () => {
      calls.push('second');
    });

    await registry.notify('/volume', -10);

    expect(calls).toEqual(['first', 'second']);
  });

  it('passes the value and only reaches the exact subject', async () => {
    const registry = new SubscriptionRegistry();
    const volume = vi.fn();
    const muted = vi.fn();
    registry.subscribe('/volume', volume);
    registry.subscribe('/muted', muted);

    await registry.notify('/volume', -12);

    expect(volume).toHaveBeenCalledTimes(1);
    expect(volume).toHaveBeenCalledWith(-12);
    expect(muted).not.toHaveBeenCalled();
  });

  it('lets one callback serve several subjects', async () => {
    const registry = new SubscriptionRegistry();
    const seen: Array<JsonValue | undefined> = [];
    const callback = (value: JsonValue | undefined) => {
      seen.push(value);
    };
    registry.subscribe('/volume', callback);
    registry.subscribe(CONNECTION_SUBJECT, callback);

    await registry.notify('/volume', -5);
    await registry.notify(CONNECTION_SUBJECT);

    expect(seen).toEqual([-5, undefined]);
  });

  it('awaits each subscriber before calling the next', async () => {
    const registry = new SubscriptionRegistry();
    const calls: string[] = [];
    registry.subscribe('/volume', async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      calls.push('slow');
    });
    registry.subscribe('/volume', () => {
      calls.push('fast');
    });

    await registry.notify('/volume', 1);

    expect(calls).toEqual(['slow', 'fast']);
  });

  it('keeps notifying after a subscriber throws', async () => {
    const registry = new SubscriptionRegistry();
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const after = vi.fn();
    registry.subscribe('/volume', () => {
      throw new Error('boom');
    });
    registry.subscribe('/volume', after);

    await registry.notify('/volume', 3);

    expect(after).toHaveBeenCalledWith(3);
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });

  it('unsubscribe removes only that registration', async () => {
    const registry = new SubscriptionRegistry();
    const kept = vi.fn();
    const removed = vi.fn();
    registry.subscribe('/volume', kept);
    const unsubscribe = registry.subscribe('/volume', removed);

    unsubscribe();
    unsubscribe();
    await registry.notify('/volume', 0);

    expect(removed).not.toHaveBeenCalled();
    expect(kept).toHaveBeenCalledTimes(1);
    expect(registry.subscriberCount('/volume')).toBe(1);
  });
});
