import { CancelledError } from '../error/cancelledError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Timeout-driven signal together with the handle that stops its timer. */
export interface TimeoutSignal {
  signal: AbortSignal;
  /** Stops the pending timer; call once the guarded call settles. */
  clear: () => void;
}

/** Signal following several sources, together with the handle that detaches it. */
export interface MergedSignal {
  signal: AbortSignal;
  /** Detaches the merged signal from its sources. */
  dispose: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort with a
 * {@link TimeoutError} after the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - Otherwise a new signal aborts as soon as any source aborts, with the
 *   source's reason when it has one and a {@link CancelledError} otherwise.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], dispose: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const dispose = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    dispose();
    controller.abort(source.reason ?? new CancelledError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, dispose };
}
