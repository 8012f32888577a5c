/**
 * Capa de transporte HTTP del motor.
 *
 * HttpTransport es el único punto por el que el motor habla con la red; NodeHttpTransport
 * lo implementa con los módulos http/https de Node (redirecciones, timeout de conexión,
 * cancelación por AbortSignal). Los tests inyectan un transporte en proceso.
 *
 * @module engines/HttpTransport
 */

import http from 'http';
import https from 'https';
import type { IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import { ERRORS } from '../constants/errors';
import { ErrorKind } from '../../shared/types';
import { DownloadError, AbortedError } from './DownloadError';
import { toDownloadError } from './DownloadValidator';

export type HttpMethod = 'GET' | 'HEAD';

export interface HttpRequestOptions {
  method: HttpMethod;
  headers: Record<string, string>;
  signal?: AbortSignal;
  /** Tiempo máximo hasta recibir cabeceras de respuesta. */
  connectTimeout: number;
  maxRedirects: number;
}

export interface HttpResponse {
  statusCode: number;
  statusMessage: string;
  /** Cabeceras con nombre en minúsculas, valores múltiples unidos por ", ". */
  headers: Record<string, string>;
  /** URL final tras redirecciones. */
  url: string;
  body: Readable;
}

export interface HttpTransport {
  request(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

const REDIRECT_STATUSES: readonly number[] = [301, 302, 303, 307, 308];

export function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

/** Valor de cabecera por nombre, sin distinguir mayúsculas. */
export function headerValue(headers: Record<string, string>, name: string): string | undefined {
  return headers[name.toLowerCase()];
}

/** Descarta el cuerpo de una respuesta que no se va a leer. */
export function discardBody(response: HttpResponse): void {
  response.body.resume();
  response.body.on('error', () => undefined);
  response.body.destroy();
}

/**
 * Transporte sobre http/https de Node.
 */
export class NodeHttpTransport implements HttpTransport {
  async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    let currentUrl = url;
    for (let redirects = 0; ; redirects++) {
      const response = await this._requestOnce(currentUrl, options);
      const location = response.headers['location'];
      if (!REDIRECT_STATUSES.includes(response.statusCode) || !location) {
        return response;
      }
      discardBody(response);
      if (redirects >= options.maxRedirects) {
        throw new DownloadError(ErrorKind.HTTP_CLIENT, ERRORS.DOWNLOAD.TOO_MANY_REDIRECTS, {
          code: 'TOO_MANY_REDIRECTS',
          statusCode: response.statusCode,
        });
      }
      currentUrl = new URL(location, currentUrl).toString();
    }
  }

  private _requestOnce(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    return new Promise<HttpResponse>((resolve, reject) => {
      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch (error) {
        reject(toDownloadError(error));
        return;
      }
      const client = parsed.protocol === 'https:' ? https : http;
      let settled = false;

      const req = client.request(parsed, {
        method: options.method,
        headers: options.headers,
        signal: options.signal,
      });

      const timer = setTimeout(() => {
        const error = new DownloadError(ErrorKind.NETWORK, ERRORS.NETWORK.TIMEOUT, {
          code: 'CONNECT_TIMEOUT',
        });
        req.destroy(error);
      }, options.connectTimeout);

      req.on('response', res => {
        clearTimeout(timer);
        settled = true;
        resolve({
          statusCode: res.statusCode ?? 0,
          statusMessage: res.statusMessage ?? '',
          headers: flattenHeaders(res.headers),
          url,
          body: res,
        });
      });

      req.on('error', error => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        if (options.signal?.aborted) {
          reject(new AbortedError());
          return;
        }
        reject(toDownloadError(error));
      });

      req.end();
    });
  }
}
