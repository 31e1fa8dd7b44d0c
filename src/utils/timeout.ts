// Per-call deadlines for dependency calls

import { DependencyTimeoutError, RequestCancelledError, type Dependency } from './errors.js';

export interface DeadlineOptions {
  timeoutMs: number;
  dependency: Dependency;
  /** Request-level cancellation; rejects with RequestCancelledError when aborted. */
  signal?: AbortSignal;
  /** Invoked when the deadline passes, before the returned promise rejects. */
  onTimeout?: () => void;
}

/**
 * Settles with `work`, or rejects once the deadline passes or the signal aborts.
 * A late settlement of `work` after that is ignored.
 */
export function raceWithDeadline<T>(work: Promise<T>, options: DeadlineOptions): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const { signal } = options;

    const onAbort = () => {
      if (settled) return;
      finish();
      reject(new RequestCancelledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      if (settled) return;
      finish();
      options.onTimeout?.();
      reject(new DependencyTimeoutError(options.dependency, options.timeoutMs));
    }, options.timeoutMs);

    function finish(): void {
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      value => {
        if (settled) return;
        finish();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        finish();
        reject(error);
      },
    );
  });
}

/**
 * Runs `fn` with an AbortSignal that fires when the deadline passes, so
 * clients that honour signals stop their own work too.
 */
export function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const controller = new AbortController();
  const abortOnCancel = () => controller.abort(options.signal?.reason);
  options.signal?.addEventListener('abort', abortOnCancel, { once: true });

  return raceWithDeadline(fn(controller.signal), {
    ...options,
    onTimeout: () => {
      controller.abort(new DependencyTimeoutError(options.dependency, options.timeoutMs));
      options.onTimeout?.();
    },
  }).finally(() => {
    options.signal?.removeEventListener('abort', abortOnCancel);
  });
}
