/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 * Caracal, a product of Garudex Labs
 *
 * Poll an item until its connection attempt finishes.
 */

import type { Logger } from 'pino';
import { STATUS_POLL_INTERVAL_MS } from './config';
import { ItemPollingError } from './errors';
import type { HookRegistry } from './hooks';
import { isItemFinished, type Item } from './models/item';

export interface PollOptions {
  /** Delay between status fetches. */
  pollIntervalMs?: number;
  /** Give up after this long, measured from the first poll. Unbounded when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Resolve after `ms`, or reject as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Re-fetch `initial` until it reaches a finished status and return that state.
 * A failed connection attempt is a normal return value; only timeouts,
 * aborts and request errors throw.
 */
export async function pollUntilFinished(
  initial: Item,
  fetchItem: (id: string) => Promise<Item>,
  context: { hooks: HookRegistry; logger: Logger },
  options: PollOptions = {},
): Promise<Item> {
  const interval = options.pollIntervalMs ?? STATUS_POLL_INTERVAL_MS;
  const deadline = options.timeoutMs === undefined ? null : Date.now() + options.timeoutMs;
  const { signal } = options;

  let item = initial;
  let attempt = 0;

  do {
    if (signal?.aborted) {
      throw new ItemPollingError('aborted', item, { cause: signal.reason });
    }

    let wait = interval;
    if (deadline !== null) {
      const left = deadline - Date.now();
      if (left <= 0) {
        throw new ItemPollingError('timeout', item);
      }
      wait = Math.min(interval, left);
    }

    try {
      await sleep(wait, signal);
    } catch (reason) {
      throw new ItemPollingError('aborted', item, { cause: reason });
    }

    attempt += 1;
    item = await fetchItem(item.id);
    context.logger.debug({ itemId: item.id, status: item.status, attempt }, 'item polled');
    context.hooks.fireItemPoll(item, attempt);
  } while (!isItemFinished(item));

  return item;
}
