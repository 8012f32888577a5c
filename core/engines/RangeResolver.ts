/**
 * Sondeo de metadatos de un recurso: tamaño, soporte de Range y nombre sugerido.
 *
 * Usa HEAD; si el servidor no lo permite (403/405/501) o no anuncia Accept-Ranges,
 * confirma con un GET de un byte (Range: bytes=0-0). Los fallos de red se reintentan
 * con la política del motor y, agotados, se reportan como network/UNREACHABLE.
 *
 * @module RangeResolver
 */

import { ERRORS } from '../constants/errors';
import { logger } from '../utils/logger';
import { ErrorKind } from '../../shared/types';
import type { ResolvedEngineSettings } from './types';
import { DownloadError } from './DownloadError';
import { errorFromStatus } from './DownloadValidator';
import { runWithRetry } from './RetryPolicy';
import { discardBody, headerValue } from './HttpTransport';
import type { HttpTransport, HttpResponse } from './HttpTransport';
import { parseContentRange } from './ChunkWorker';
import { parseContentDisposition } from './NameResolver';

const log = logger.child('RangeResolver');

const HEAD_DISALLOWED: readonly number[] = [403, 405, 501];

export interface ProbeResult {
  /** null si el servidor no declara tamaño. */
  size: number | null;
  supportsRange: boolean;
  suggestedName: string | null;
  /** URL final tras redirecciones. */
  finalUrl: string;
}

function parseLength(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  return parseInt(value.trim(), 10);
}

// Tamaño total de un 416 (Content-Range "bytes */N")
function unsatisfiedTotal(value: string | undefined): number | null {
  const match = value ? /^bytes\s+\*\/(\d+)$/i.exec(value.trim()) : null;
  return match ? parseInt(match[1], 10) : null;
}

export class RangeResolver {
  constructor(
    private readonly transport: HttpTransport,
    private readonly settings: ResolvedEngineSettings
  ) {}

  async probe(url: string, headers: Record<string, string> = {}, signal?: AbortSignal): Promise<ProbeResult> {
    try {
      const result = await runWithRetry(() => this._probeOnce(url, headers, signal), {
        policy: this.settings,
        signal,
        onRetry: (error, attempt, delayMs) => {
          log.warn(`Sondeo de ${url} falló (intento ${attempt}: ${error.message}); reintento en ${delayMs}ms`);
        },
      });
      log.info(
        `Sondeo ${url}: tamaño=${result.size ?? 'desconocido'}, range=${result.supportsRange}, nombre=${result.suggestedName ?? '-'}`
      );
      return result;
    } catch (error) {
      if (error instanceof DownloadError && error.kind === ErrorKind.NETWORK) {
        throw new DownloadError(ErrorKind.NETWORK, `${ERRORS.NETWORK.UNREACHABLE}: ${error.message}`, {
          code: 'UNREACHABLE',
          cause: error,
        });
      }
      throw error;
    }
  }

  private _request(
    url: string,
    method: 'GET' | 'HEAD',
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<HttpResponse> {
    return this.transport.request(url, {
      method,
      headers: { 'User-Agent': this.settings.userAgent, ...headers },
      signal,
      connectTimeout: this.settings.connectTimeout,
      maxRedirects: this.settings.maxRedirects,
    });
  }

  private async _probeOnce(
    url: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<ProbeResult> {
    const head = await this._request(url, 'HEAD', headers, signal);
    discardBody(head);

    if (head.statusCode >= 200 && head.statusCode < 300) {
      const acceptRanges = headerValue(head.headers, 'accept-ranges')?.toLowerCase();
      const fromHead: ProbeResult = {
        size: parseLength(headerValue(head.headers, 'content-length')),
        supportsRange: acceptRanges === 'bytes',
        suggestedName: parseContentDisposition(headerValue(head.headers, 'content-disposition')),
        finalUrl: head.url,
      };
      if (acceptRanges !== undefined) return fromHead;

      // Sin Accept-Ranges: se confirma con un GET de un byte
      const ranged = await this._rangeProbe(url, headers, signal);
      return {
        size: fromHead.size ?? ranged.size,
        supportsRange: ranged.supportsRange,
        suggestedName: fromHead.suggestedName ?? ranged.suggestedName,
        finalUrl: fromHead.finalUrl,
      };
    }

    if (HEAD_DISALLOWED.includes(head.statusCode)) {
      log.debug(`HEAD no permitido (${head.statusCode}) para ${url}; se usa GET con Range`);
      return this._rangeProbe(url, headers, signal);
    }

    throw errorFromStatus(head.statusCode, head.headers, this.settings.retryAfterMaxMs);
  }

  private async _rangeProbe(
    url: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<ProbeResult> {
    const res = await this._request(url, 'GET', { ...headers, Range: 'bytes=0-0' }, signal);
    discardBody(res);
    const suggestedName = parseContentDisposition(headerValue(res.headers, 'content-disposition'));

    if (res.statusCode === 206) {
      const contentRange = parseContentRange(headerValue(res.headers, 'content-range'));
      return {
        size: contentRange?.total ?? null,
        supportsRange: contentRange !== null,
        suggestedName,
        finalUrl: res.url,
      };
    }
    if (res.statusCode === 200) {
      return {
        size: parseLength(headerValue(res.headers, 'content-length')),
        supportsRange: false,
        suggestedName,
        finalUrl: res.url,
      };
    }
    if (res.statusCode === 416) {
      // Recurso vacío: ningún byte satisface bytes=0-0
      const total = unsatisfiedTotal(headerValue(res.headers, 'content-range'));
      if (total === 0) {
        return { size: 0, supportsRange: true, suggestedName, finalUrl: res.url };
      }
    }
    throw errorFromStatus(res.statusCode, res.headers, this.settings.retryAfterMaxMs);
  }
}
