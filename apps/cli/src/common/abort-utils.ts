import { anySignal } from "any-signal";

/**
 * Returns the abort reason from a signal as an Error, or creates a generic AbortError.
 */
export function createAbortError(signal?: AbortSignal): Error {
  if (signal?.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

export interface DeadlineSignal {
  /** Fires when either the deadline passes or the parent signal aborts. */
  signal: AbortSignal;
  /** Fires only when the deadline passes. */
  deadlineSignal: AbortSignal;
  /** Detaches listeners from the parent signal once the guarded work is done. */
  clear: () => void;
}

/**
 * Combines a per-operation deadline with an optional caller cancellation signal.
 */
export function buildDeadlineSignal(timeoutMs: number, parentSignal?: AbortSignal): DeadlineSignal {
  const deadlineSignal = AbortSignal.timeout(timeoutMs);
  const combined = anySignal(parentSignal ? [deadlineSignal, parentSignal] : [deadlineSignal]);

  return {
    signal: combined,
    deadlineSignal,
    clear: () => combined.clear(),
  };
}
