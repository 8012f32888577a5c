/**
 * Backoff exponencial con jitter y bucle de reintentos cancelable.
 *
 * @module engines/RetryPolicy
 */

import { AbortedError, DownloadError, throwIfAborted } from './DownloadError';
import { toDownloadError } from './DownloadValidator';

export interface RetryPolicyOptions {
  /** Intentos totales (el primero incluido). */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter relativo (0.0-1.0) aplicado sobre el delay exponencial. */
  jitterFactor: number;
}

/** Calcula delay de reintento en ms: base·2^retryCount más jitter, acotado por maxDelayMs. */
export function calculateBackoffDelay(
  retryCount: number,
  policy: RetryPolicyOptions,
  random: () => number = Math.random
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, retryCount);
  const jitter = random() * policy.jitterFactor * exponentialDelay;
  return Math.round(Math.min(exponentialDelay + jitter, policy.maxDelayMs));
}

/** Delay antes del próximo intento: Retry-After del servidor si lo hay, si no backoff. */
export function retryDelayFor(
  error: DownloadError,
  retryCount: number,
  policy: RetryPolicyOptions
): number {
  if (error.retryAfterMs !== undefined && error.retryAfterMs > 0) {
    return error.retryAfterMs;
  }
  return calculateBackoffDelay(retryCount, policy);
}

/** Espera ms milisegundos; rechaza con AbortedError si la señal se aborta antes. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RunWithRetryOptions {
  policy: RetryPolicyOptions;
  signal?: AbortSignal;
  /** Se llama antes de esperar cada reintento. */
  onRetry?: (_error: DownloadError, _attempt: number, _delayMs: number) => void;
}

/**
 * Ejecuta fn hasta que tenga éxito, falle con un error no reintentable o se agoten
 * los intentos. Las cancelaciones se propagan sin reintentar.
 */
export async function runWithRetry<T>(
  fn: (_attempt: number) => Promise<T>,
  options: RunWithRetryOptions
): Promise<T> {
  const { policy, signal, onRetry } = options;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof AbortedError || signal?.aborted) {
        throw error instanceof AbortedError ? error : new AbortedError();
      }
      const downloadError = toDownloadError(error);
      if (!downloadError.retryable || attempt >= maxAttempts) {
        throw downloadError;
      }
      const delayMs = retryDelayFor(downloadError, attempt - 1, policy);
      onRetry?.(downloadError, attempt, delayMs);
      await sleep(delayMs, signal);
    }
  }
}
