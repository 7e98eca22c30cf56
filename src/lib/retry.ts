// src/lib/retry.ts
// One retry policy for every call into an external collaborator:
// per-attempt timeout, exponential backoff, bounded attempts.

import {
  RunCancelledError,
  UpstreamError,
  UpstreamService,
  errorMessage,
  isRetryableError,
  throwIfCancelled,
} from "./errors";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  isRetryable: (err: unknown) => boolean;
};

export type UpstreamCall = {
  service: UpstreamService;
  label: string;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 4000,
  timeoutMs: 15000,
  isRetryable: isRetryableError,
};

/** Delay to wait after the given (1-based) failed attempt. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RunCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RunCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Runs `fn` with a signal that aborts when `timeoutMs` elapses or the
 * parent signal aborts, whichever comes first.
 */
export async function withTimeout<T>(
  call: UpstreamCall,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  throwIfCancelled(parent);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new UpstreamError(
        call.service,
        `${call.label} timed out after ${timeoutMs}ms`,
        { timedOut: true }
      );
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        controller.abort(parent.reason);
        reject(new RunCancelledError(`${call.label} cancelled`));
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener("abort", onParentAbort);
    }
  }
}

export async function withRetry<T>(
  call: UpstreamCall,
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  signal?: AbortSignal,
  wait: Sleep = sleep
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(call, fn, policy.timeoutMs, signal);
    } catch (err) {
      if (err instanceof RunCancelledError) throw err;
      throwIfCancelled(signal);

      if (attempt >= policy.maxAttempts || !policy.isRetryable(err)) {
        throw err;
      }

      const delayMs = backoffDelay(policy, attempt);
      console.warn(`retry: ${call.label} failed, backing off`, {
        service: call.service,
        attempt,
        max_attempts: policy.maxAttempts,
        delay_ms: delayMs,
        error: errorMessage(err),
      });
      await wait(delayMs, signal);
    }
  }
}
