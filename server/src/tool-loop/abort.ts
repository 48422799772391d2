/**
 * Abort Utilities
 *
 * Race an async operation against an AbortSignal, and build the signal a
 * turn runs under from the caller's signal plus an optional timeout.
 */

import { CancelledError, ConversationError } from "../errors.js";

/** The error an aborted signal stands for. */
export function abortReason(signal: AbortSignal): ConversationError {
  const reason: unknown = signal.reason;
  return reason instanceof ConversationError ? reason : new CancelledError();
}

/**
 * Race an async operation against an AbortSignal.
 * If the signal fires first, rejects with its reason. The operation itself
 * is not stopped; pass the signal down as well when it can listen.
 */
export function abortableCall<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return fn();
  if (signal.aborted) return Promise.reject(abortReason(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(abortReason(signal));
    };

    signal.addEventListener("abort", onAbort, { once: true });

    fn().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export interface TurnSignal {
  signal?: AbortSignal;
  dispose(): void;
}

/**
 * Combine a caller signal and a turn timeout into one signal. Aborts with a
 * CancelledError either way. Call dispose() when the turn ends.
 */
export function createTurnSignal(parent?: AbortSignal, timeoutMs?: number): TurnSignal {
  if (!parent && timeoutMs === undefined) {
    return { signal: undefined, dispose: () => {} };
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(new CancelledError());

  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer = timeoutMs === undefined
    ? undefined
    : setTimeout(() => controller.abort(new CancelledError(`Turn timed out after ${timeoutMs}ms`)), timeoutMs);

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
