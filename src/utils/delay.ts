/**
 * Cancellable delay used between embedding retry attempts.
 */

import { CancelledError } from '../errors/index.js';

/**
 * Signature of a delay primitive. Injectable so tests can record
 * backoff durations instead of waiting them out.
 */
export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms` milliseconds, or reject with CancelledError as soon
 * as `signal` aborts. An already-aborted signal rejects immediately.
 */
export const sleep: DelayFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
