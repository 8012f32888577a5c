/**
 * Worker de un chunk: transmite un rango de bytes (o el recurso completo en
 * single-stream) al offset correcto del archivo destino.
 *
 * Cada intento pide el sub-rango pendiente [start + bytesWritten, end), así que un corte
 * a mitad de chunk solo pierde lo no escrito. Los errores transitorios se reintentan
 * localmente con backoff; solo al agotar intentos el chunk queda Failed y el error sube.
 * Ante cancelación, el worker termina la escritura en curso y sale.
 *
 * @module ChunkWorker
 */

import type { FileHandle } from 'fs/promises';
import { ERRORS } from '../constants/errors';
import { logger } from '../utils/logger';
import { ErrorKind } from '../../shared/types';
import { ChunkState } from './types';
import type { Chunk, DownloadTask, ResolvedEngineSettings } from './types';
import { transitionChunk, isActiveChunkState } from './DownloadStateMachine';
import { AbortedError, DownloadError, isAbortError, throwIfAborted } from './DownloadError';
import { errorFromStatus, toDownloadError } from './DownloadValidator';
import { runWithRetry } from './RetryPolicy';
import { discardBody, headerValue } from './HttpTransport';
import type { HttpTransport, HttpResponse } from './HttpTransport';
import type { ResumeWriter } from './ResumeWriter';
import type { ProgressAggregator } from './ProgressAggregator';
import type { IncrementalDigest } from './Verifier';
import type EventBus from './EventBus';

const log = logger.child('ChunkWorker');

export interface ChunkWorkerContext {
  task: DownloadTask;
  transport: HttpTransport;
  fileHandle: FileHandle;
  settings: ResolvedEngineSettings;
  /** true cuando la tarea tiene varios chunks: un 200 a un Range es range_unsupported. */
  multiPart: boolean;
  writer: ResumeWriter;
  progress: ProgressAggregator;
  events: EventBus;
  /** Solo single-stream: digest alimentado en orden de escritura. */
  digest: IncrementalDigest | null;
  signal: AbortSignal;
}

export interface ContentRange {
  start: number;
  end: number;
  total: number | null;
}

/** Parsea "bytes start-end/total" (total puede ser "*"). */
export function parseContentRange(value: string | undefined): ContentRange | null {
  if (!value) return null;
  const match = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(value.trim());
  if (!match) return null;
  return {
    start: parseInt(match[1], 10),
    end: parseInt(match[2], 10),
    total: match[3] === '*' ? null : parseInt(match[3], 10),
  };
}

/** Cabecera Range del intento actual, o null si se pide el recurso completo. */
export function rangeHeaderFor(chunk: Chunk, multiPart: boolean, supportsRange: boolean): string | null {
  const from = chunk.startOffset + chunk.bytesWritten;
  if (multiPart && chunk.endOffset !== null) {
    return `bytes=${from}-${chunk.endOffset - 1}`;
  }
  if (supportsRange && chunk.bytesWritten > 0) {
    return `bytes=${from}-`;
  }
  return null;
}

function buildHeaders(ctx: ChunkWorkerContext, range: string | null): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': ctx.settings.userAgent,
    ...ctx.task.headers,
  };
  if (range) headers['Range'] = range;
  return headers;
}

function sizeLimitError(limit: number): DownloadError {
  return new DownloadError(
    ErrorKind.SIZE_LIMIT_EXCEEDED,
    `${ERRORS.DOWNLOAD.SIZE_LIMIT_EXCEEDED} (${limit} bytes)`,
    { code: 'SIZE_LIMIT_EXCEEDED' }
  );
}

/**
 * Ejecuta el chunk hasta Complete. Lanza DownloadError al agotar intentos o ante un
 * error no reintentable, y AbortedError si la señal se aborta.
 */
export async function runChunk(chunk: Chunk, ctx: ChunkWorkerContext): Promise<void> {
  if (chunk.status === ChunkState.COMPLETE) return;

  try {
    await runWithRetry(
      async attempt => {
        chunk.attemptCount = attempt;
        if (chunk.status === ChunkState.FAILED) {
          transitionChunk(chunk, ChunkState.PENDING);
        }
        await attemptChunk(chunk, ctx);
      },
      {
        policy: ctx.settings,
        signal: ctx.signal,
        onRetry: (error, attempt, delayMs) => {
          if (chunk.status !== ChunkState.FAILED) transitionChunk(chunk, ChunkState.FAILED);
          ctx.events.emitChunkFailed(ctx.task.id, chunk.id, error.message, true);
          log.warn(
            `Chunk ${chunk.id} de ${ctx.task.id}: intento ${attempt} falló (${error.code ?? error.kind}: ${error.message}), reintento en ${delayMs}ms desde offset ${chunk.startOffset + chunk.bytesWritten}`
          );
        },
      }
    );
  } catch (error) {
    if (isAbortError(error)) {
      if (isActiveChunkState(chunk.status) || chunk.status === ChunkState.FAILED) {
        transitionChunk(chunk, ChunkState.PENDING);
      }
      throw error instanceof AbortedError ? error : new AbortedError();
    }
    const downloadError = toDownloadError(error);
    if (chunk.status !== ChunkState.FAILED) transitionChunk(chunk, ChunkState.FAILED);
    ctx.events.emitChunkFailed(ctx.task.id, chunk.id, downloadError.message, false);
    throw downloadError;
  }
}

async function attemptChunk(chunk: Chunk, ctx: ChunkWorkerContext): Promise<void> {
  throwIfAborted(ctx.signal);
  if (chunk.endOffset !== null && chunk.startOffset + chunk.bytesWritten >= chunk.endOffset) {
    // Todo el rango ya estaba escrito (registro guardado antes de marcar complete)
    transitionChunk(chunk, ChunkState.COMPLETE);
    ctx.writer.noteComplete(chunk);
    ctx.events.emitChunkCompleted(ctx.task.id, chunk.id);
    return;
  }
  transitionChunk(chunk, ChunkState.CONNECTING);

  const range = rangeHeaderFor(chunk, ctx.multiPart, ctx.task.supportsRange);
  let response = await requestRange(chunk, ctx, range);

  if (!(await acceptResponse(chunk, ctx, response, range))) {
    response = await requestRange(chunk, ctx, null);
    await acceptResponse(chunk, ctx, response, null);
  }
  transitionChunk(chunk, ChunkState.STREAMING);
  await streamBody(chunk, ctx, response);

  transitionChunk(chunk, ChunkState.COMPLETE);
  ctx.writer.noteComplete(chunk);
  ctx.events.emitChunkCompleted(ctx.task.id, chunk.id);
  log.debug(`Chunk ${chunk.id} completado (${chunk.bytesWritten} bytes)`);
}

function requestRange(chunk: Chunk, ctx: ChunkWorkerContext, range: string | null): Promise<HttpResponse> {
  log.debug(`Chunk ${chunk.id}: GET ${ctx.task.url}${range ? ` (${range})` : ''}`);
  return ctx.transport.request(ctx.task.url, {
    method: 'GET',
    headers: buildHeaders(ctx, range),
    signal: ctx.signal,
    connectTimeout: ctx.settings.connectTimeout,
    maxRedirects: ctx.settings.maxRedirects,
  });
}

/** Vuelve un chunk single-stream a 0 bytes junto con su digest y su registro. */
async function rewindChunk(chunk: Chunk, ctx: ChunkWorkerContext): Promise<void> {
  chunk.bytesWritten = 0;
  ctx.digest?.reset();
  await ctx.writer.resetChunk(chunk);
}

/**
 * Valida status y Content-Range; rebobina single-stream si el servidor ignora el Range.
 * Devuelve false si la respuesta se descartó y hay que pedir el cuerpo completo sin Range.
 */
async function acceptResponse(
  chunk: Chunk,
  ctx: ChunkWorkerContext,
  response: HttpResponse,
  range: string | null
): Promise<boolean> {
  const { statusCode, headers } = response;

  if (statusCode === 206 && range) {
    const contentRange = parseContentRange(headerValue(headers, 'content-range'));
    const expectedStart = chunk.startOffset + chunk.bytesWritten;
    const expectedEnd = ctx.multiPart && chunk.endOffset !== null ? chunk.endOffset - 1 : null;
    if (
      !contentRange ||
      contentRange.start !== expectedStart ||
      (expectedEnd !== null && contentRange.end !== expectedEnd)
    ) {
      discardBody(response);
      if (!ctx.multiPart) {
        log.info(`Content-Range inesperado al reanudar ${ctx.task.url}: se descarga de nuevo desde 0`);
        await rewindChunk(chunk, ctx);
        return false;
      }
      throw new DownloadError(ErrorKind.RANGE_UNSUPPORTED, ERRORS.DOWNLOAD.CONTENT_RANGE_MISMATCH, {
        code: 'CONTENT_RANGE_MISMATCH',
        statusCode,
      });
    }
  } else if (statusCode === 200 || statusCode === 206) {
    if (range && ctx.multiPart) {
      discardBody(response);
      throw new DownloadError(ErrorKind.RANGE_UNSUPPORTED, ERRORS.DOWNLOAD.RANGE_IGNORED, {
        code: 'RANGE_IGNORED',
        statusCode,
      });
    }
    if (chunk.bytesWritten > 0) {
      log.info(`El servidor devolvió ${statusCode} a la reanudación de ${ctx.task.url}: se reescribe desde 0`);
      await rewindChunk(chunk, ctx);
    }
  } else {
    discardBody(response);
    throw errorFromStatus(statusCode, headers, ctx.settings.retryAfterMaxMs);
  }

  const limit = ctx.task.maxBytes;
  const contentLength = headerValue(headers, 'content-length');
  if (limit !== null && contentLength !== undefined && /^\d+$/.test(contentLength)) {
    if (chunk.startOffset + chunk.bytesWritten + parseInt(contentLength, 10) > limit) {
      discardBody(response);
      throw sizeLimitError(limit);
    }
  }
  return true;
}

async function writeAt(fileHandle: FileHandle, data: Buffer, position: number): Promise<void> {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await fileHandle.write(data, offset, data.length - offset, position + offset);
    offset += bytesWritten;
  }
}

async function streamBody(chunk: Chunk, ctx: ChunkWorkerContext, response: HttpResponse): Promise<void> {
  const body = response.body;
  const limit = ctx.task.maxBytes;
  const declared = headerValue(response.headers, 'content-length');
  const declaredLength = declared !== undefined && /^\d+$/.test(declared) ? parseInt(declared, 10) : null;
  let received = 0;
  let idleTimer: ReturnType<typeof setTimeout> | null = null;

  const armIdleTimer = (): void => {
    if (idleTimer) clearTimeout(idleTimer);
    idleTimer = setTimeout(() => {
      body.destroy(
        new DownloadError(ErrorKind.NETWORK, ERRORS.NETWORK.IDLE_TIMEOUT, { code: 'IDLE_TIMEOUT' })
      );
    }, ctx.settings.idleTimeout);
  };
  const onAbort = (): void => {
    body.destroy(new AbortedError());
  };

  ctx.signal.addEventListener('abort', onAbort, { once: true });
  armIdleTimer();

  try {
    for await (const piece of body) {
      if (!Buffer.isBuffer(piece)) continue;
      armIdleTimer();

      let data = piece;
      if (chunk.endOffset !== null) {
        const remaining = chunk.endOffset - chunk.startOffset - chunk.bytesWritten;
        if (remaining <= 0) break;
        if (data.length > remaining) data = data.subarray(0, remaining);
      }
      const position = chunk.startOffset + chunk.bytesWritten;
      if (limit !== null && position + data.length > limit) {
        throw sizeLimitError(limit);
      }

      await writeAt(ctx.fileHandle, data, position);
      received += data.length;
      chunk.bytesWritten += data.length;
      ctx.digest?.update(data);
      ctx.progress.addSessionBytes(data.length);
      ctx.writer.noteProgress(chunk, data.length);

      // La escritura en curso termina antes de atender la cancelación
      throwIfAborted(ctx.signal);
    }
  } catch (error) {
    if (ctx.signal.aborted || isAbortError(error)) throw new AbortedError();
    throw toDownloadError(error);
  } finally {
    if (idleTimer) clearTimeout(idleTimer);
    ctx.signal.removeEventListener('abort', onAbort);
    if (!body.destroyed) body.destroy();
  }

  if (chunk.endOffset === null) {
    if (declaredLength !== null && received < declaredLength) {
      throw new DownloadError(ErrorKind.NETWORK, ERRORS.DOWNLOAD.CONNECTION_CLOSED, {
        code: 'CONNECTION_CLOSED',
      });
    }
    // Tamaño desconocido: el final del stream fija la longitud
    chunk.endOffset = chunk.startOffset + chunk.bytesWritten;
    return;
  }
  if (chunk.startOffset + chunk.bytesWritten < chunk.endOffset) {
    throw new DownloadError(ErrorKind.NETWORK, ERRORS.DOWNLOAD.CONNECTION_CLOSED, {
      code: 'CONNECTION_CLOSED',
    });
  }
}
