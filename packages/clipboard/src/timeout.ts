import { BackendTimeoutError } from './errors.js';

/**
 * Races `operation` against a timer. The timer is cleared once either side
 * settles; a late rejection from an abandoned operation is discarded.
 * On timeout the signal handed to `operation` is aborted so it can release
 * whatever it started (a child process, a socket).
 */
export function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finishOnce = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      fn();
    };

    const timer = setTimeout(() => {
      const error = new BackendTimeoutError(label, timeoutMs);
      finishOnce(() => reject(error));
      controller.abort(error);
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      finishOnce(() => reject(error));
      return;
    }

    pending.then(
      (value) => finishOnce(() => resolve(value)),
      (error: unknown) => finishOnce(() => reject(error)),
    );
  });
}
