// packages/playlist-backend/src/application/retry-policy.ts
//
// Error classification, backoff and the call-with-timeout contract used for every stage attempt.

import { ZodError } from 'zod';

import {
  CancelledError,
  TransientError,
  isOrchestratorError,
  type JobErrorKind,
} from '@vibelist/contracts';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

function readField(error: unknown, key: 'code' | 'status'): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Maps any thrown value to an error kind. Anything not recognisably
 * retryable is permanent.
 */
export function classifyError(error: unknown): JobErrorKind {
  if (isOrchestratorError(error)) return error.kind;
  if (error instanceof ZodError || error instanceof SyntaxError) return 'permanent';

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return 'transient';
  }

  const code = readField(error, 'code');
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) return 'transient';

  const status = readField(error, 'status');
  if (typeof status === 'number') {
    return isTransientStatus(status) ? 'transient' : 'permanent';
  }

  // fetch() wraps socket failures: TypeError('fetch failed', { cause })
  if (error instanceof Error && error.cause !== undefined && error.cause !== error) {
    const inner = classifyError(error.cause);
    if (inner === 'transient') return inner;
  }

  return 'permanent';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

/** Delay before the attempt following `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  return capped + Math.floor(random() * policy.jitterMs);
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` with an attempt-scoped signal that aborts after `timeoutMs`.
 * A call that ignores its signal is abandoned once the timeout elapses; its
 * late settlement goes to `onLateSettle`.
 */
export async function callWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  onLateSettle?: (error: unknown) => void,
): Promise<T> {
  const controller = new AbortController();
  const call = fn(controller.signal);
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TransientError(`${label} timed out after ${timeoutMs}ms`);
      controller.abort(error);
      void call.then(
        () => onLateSettle?.(null),
        (late: unknown) => onLateSettle?.(late),
      );
      reject(error);
    }, timeoutMs);
    timer.unref?.();
  });

  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type AttemptOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; kind: JobErrorKind; attempts: number };

export interface RetryOptions<T> {
  policy: RetryPolicy;
  timeoutMs: number;
  label: string;
  /** Cooperative cancellation; checked before each attempt and wakes backoff sleeps. */
  cancelSignal: AbortSignal;
  run: (attempt: number, signal: AbortSignal) => Promise<T>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  onLateSettle?: (error: unknown) => void;
  random?: () => number;
}

/**
 * Retries transient failures up to `policy.maxAttempts` with exponential backoff.
 * Never throws: the outcome carries the classified error.
 */
export async function runWithRetry<T>(options: RetryOptions<T>): Promise<AttemptOutcome<T>> {
  const { policy, cancelSignal } = options;
  let attempts = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (cancelSignal.aborted) {
      return { ok: false, error: new CancelledError(), kind: 'cancelled', attempts };
    }

    attempts = attempt;
    try {
      const value = await callWithTimeout(
        (signal) => options.run(attempt, signal),
        options.timeoutMs,
        options.label,
        options.onLateSettle,
      );
      return { ok: true, value, attempts };
    } catch (error: unknown) {
      const kind = classifyError(error);
      if (kind !== 'transient' || attempt === policy.maxAttempts) {
        return { ok: false, error, kind, attempts };
      }

      const delayMs = backoffDelay(policy, attempt, options.random);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, cancelSignal);
    }
  }

  // Only reached when maxAttempts < 1.
  return {
    ok: false,
    error: new TransientError(`${options.label} exhausted ${policy.maxAttempts} attempts`),
    kind: 'transient',
    attempts,
  };
}
