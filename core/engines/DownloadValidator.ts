/**
 * Clasificación de errores de red, disco y HTTP para el motor de descargas.
 *
 * isTransientNetworkError: detecta errores que merecen reintento (ECONNRESET, ETIMEDOUT, etc.).
 * toDownloadError: convierte cualquier error capturado a DownloadError con su ErrorKind.
 * errorFromStatus: traduce un status HTTP no exitoso.
 * parseRetryAfter: interpreta cabecera Retry-After (segundos o fecha).
 *
 * @module engines/DownloadValidator
 */

import config from '../config';
import { ERRORS } from '../constants/errors';
import { ErrorKind } from '../../shared/types';
import { DownloadError } from './DownloadError';
import { errnoCode, errorMessage } from '../utils/errorHelpers';

const TRANSIENT_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ECONNABORTED',
  'ERR_STREAM_PREMATURE_CLOSE',
  'IDLE_TIMEOUT',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
];

const DISK_ERROR_CODES: readonly string[] = [
  'ENOSPC',
  'EACCES',
  'EPERM',
  'EROFS',
  'EISDIR',
  'ENOTDIR',
  'EMFILE',
  'EDQUOT',
];

/** Indica si el error es de red transitorio (reintento razonable). */
export function isTransientNetworkError(error: unknown): boolean {
  if (error instanceof DownloadError) return error.kind === ErrorKind.NETWORK;
  const code = errnoCode(error);
  return code !== undefined && TRANSIENT_ERROR_CODES.includes(code);
}

export function isDiskError(error: unknown): boolean {
  const code = errnoCode(error);
  return code !== undefined && DISK_ERROR_CODES.includes(code);
}

/** Convierte un error capturado a DownloadError. Un DownloadError se devuelve tal cual. */
export function toDownloadError(error: unknown): DownloadError {
  if (error instanceof DownloadError) return error;
  const code = errnoCode(error);
  const message = errorMessage(error);

  if (isTransientNetworkError(error)) {
    return new DownloadError(ErrorKind.NETWORK, message, { code, cause: error });
  }
  if (isDiskError(error)) {
    return new DownloadError(ErrorKind.DISK, message, { code, cause: error });
  }
  return new DownloadError(ErrorKind.INTERNAL, message || ERRORS.GENERAL.UNEXPECTED, {
    code,
    cause: error,
  });
}

/** Parsea cabecera Retry-After (entero segundos o fecha HTTP); devuelve ms o null. */
export function parseRetryAfter(
  retryAfter: string | undefined,
  maxMs: number = config.network.retryAfterMaxMs,
  now: number = Date.now()
): number | null {
  if (!retryAfter) return null;
  const s = retryAfter.trim();
  if (/^\d+$/.test(s)) {
    return Math.min(parseInt(s, 10) * 1000, maxMs);
  }
  const date = new Date(s);
  if (!Number.isNaN(date.getTime())) {
    const ms = date.getTime() - now;
    return ms > 0 ? Math.min(ms, maxMs) : null;
  }
  return null;
}

/**
 * Traduce un status HTTP no exitoso a DownloadError.
 * 429 y 5xx son reintentables; el resto de 4xx no.
 */
export function errorFromStatus(
  statusCode: number,
  headers: Record<string, string>,
  retryAfterMaxMs: number = config.network.retryAfterMaxMs
): DownloadError {
  if (statusCode === 429 || statusCode >= 500) {
    const retryAfterMs = parseRetryAfter(headers['retry-after'], retryAfterMaxMs) ?? undefined;
    return new DownloadError(ErrorKind.HTTP_RATE_LIMIT_OR_SERVER, `HTTP ${statusCode}`, {
      code: `HTTP_${statusCode}`,
      statusCode,
      retryAfterMs,
    });
  }
  if (statusCode === 416) {
    return new DownloadError(ErrorKind.HTTP_CLIENT, ERRORS.DOWNLOAD.RANGE_NOT_SATISFIABLE, {
      code: 'RANGE_NOT_SATISFIABLE',
      statusCode,
    });
  }
  return new DownloadError(ErrorKind.HTTP_CLIENT, `HTTP ${statusCode}`, {
    code: `HTTP_${statusCode}`,
    statusCode,
  });
}

export function isRangeNotSatisfiable(error: unknown): boolean {
  return error instanceof DownloadError && error.code === 'RANGE_NOT_SATISFIABLE';
}
