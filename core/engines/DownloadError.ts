/**
 * Errores del motor de descargas.
 *
 * DownloadError lleva un ErrorKind de la clasificación cerrada; AbortedError marca una
 * cancelación cooperativa y nunca se reporta como fallo.
 *
 * @module engines/DownloadError
 */

import { ErrorKind } from '../../shared/types';
import type { ErrorKindType, TaskError } from '../../shared/types';
import { errorName } from '../utils/errorHelpers';

export interface DownloadErrorOptions {
  code?: string;
  statusCode?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

const RETRYABLE_KINDS: readonly ErrorKindType[] = [
  ErrorKind.NETWORK,
  ErrorKind.HTTP_RATE_LIMIT_OR_SERVER,
];

export class DownloadError extends Error {
  readonly kind: ErrorKindType;
  readonly code?: string;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(kind: ErrorKindType, message: string, options: DownloadErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DownloadError';
    this.kind = kind;
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.includes(this.kind);
  }

  toTaskError(): TaskError {
    const taskError: TaskError = { kind: this.kind, message: this.message };
    if (this.code !== undefined) taskError.code = this.code;
    if (this.statusCode !== undefined) taskError.statusCode = this.statusCode;
    return taskError;
  }
}

/** Cancelación cooperativa (señal de tarea o de batch). */
export class AbortedError extends Error {
  constructor(message = 'Operación cancelada') {
    super(message);
    this.name = 'AbortedError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof AbortedError || errorName(error) === 'AbortError';
}

/** Lanza AbortedError si la señal ya está abortada. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AbortedError();
  }
}
