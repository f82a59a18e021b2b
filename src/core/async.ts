/**
 * async.ts — Timing helpers shared by the pool and the harvesters.
 *
 * Every wait in the pipeline is bounded: navigation, element waits and
 * extraction all go through `withTimeout()`, and every sleep can be cut short
 * by the run's AbortSignal.
 */

import { CancelledError, ExtractionTimeoutError, describeError } from './errors';
import { Logger } from './logger';

const logger = new Logger('Async');

/** Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
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
}

/**
 * Race `work` against a timer.  On expiry rejects with ExtractionTimeoutError
 * naming `what`; a late settlement of `work` is logged at debug level.
 */
export function withTimeout<T>(work: Promise<T>, ms: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      reject(new ExtractionTimeoutError(what, ms));
    }, ms);

    work.then(
      (value) => {
        clearTimeout(timer);
        if (!expired) resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        if (expired) {
          logger.debug(`${what} failed after its timeout: ${describeError(err)}`);
          return;
        }
        reject(err);
      },
    );
  });
}

/**
 * Reject with CancelledError when `signal` aborts, otherwise settle with
 * `work`.  Does not stop `work` itself; callers tear down whatever it uses.
 */
export function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError());
      work.catch((err: unknown) =>
        logger.debug(`Cancelled work failed: ${describeError(err)}`),
      );
      return;
    }

    let settled = false;
    const onAbort = () => {
      if (settled) return;
      settled = true;
      reject(new CancelledError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        if (settled) return;
        settled = true;
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (settled) {
          logger.debug(`Cancelled work failed: ${describeError(err)}`);
          return;
        }
        settled = true;
        reject(err);
      },
    );
  });
}
