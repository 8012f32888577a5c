/**
 * Partición determinista de un tamaño conocido en rangos contiguos para N workers.
 *
 * Si el recurso es menor que workers × minChunkSize, el número de chunks se reduce a
 * max(1, floor(size / minChunkSize)). El último chunk absorbe el resto. Entradas
 * idénticas producen siempre los mismos límites, requisito para reanudar.
 *
 * @module ChunkPlanner
 */

import { ChunkState } from './types';
import type { Chunk } from './types';

export interface ChunkBounds {
  startOffset: number;
  endOffset: number | null;
}

/** Número de chunks efectivo para un tamaño y un worker_count pedido. */
export function effectiveWorkerCount(size: number, workerCount: number, minChunkSize: number): number {
  const requested = Math.max(1, Math.floor(workerCount));
  if (size <= 0) return 1;
  if (size < requested * minChunkSize) {
    return Math.max(1, Math.floor(size / minChunkSize));
  }
  return requested;
}

/**
 * Genera el plan de chunks. size 0 no produce chunks; size null produce un único
 * chunk de final desconocido (single-stream).
 */
export function planChunks(size: number | null, workerCount: number, minChunkSize: number): Chunk[] {
  if (size === null) {
    return [createChunk(0, 0, null)];
  }
  if (size === 0) return [];

  const n = effectiveWorkerCount(size, workerCount, minChunkSize);
  const chunkLength = Math.floor(size / n);
  const chunks: Chunk[] = [];
  for (let i = 0; i < n; i++) {
    const start = i * chunkLength;
    const end = i === n - 1 ? size : start + chunkLength;
    chunks.push(createChunk(i, start, end));
  }
  return chunks;
}

/** Plan de un solo chunk que cubre todo el recurso. */
export function planSingleStream(size: number | null): Chunk[] {
  if (size === 0) return [];
  return [createChunk(0, 0, size)];
}

function createChunk(id: number, startOffset: number, endOffset: number | null): Chunk {
  return {
    id,
    startOffset,
    endOffset,
    bytesWritten: 0,
    status: ChunkState.PENDING,
    attemptCount: 0,
  };
}

/** Compara límites de dos planes (ignora progreso y estado). */
export function isSamePlan(a: readonly ChunkBounds[], b: readonly ChunkBounds[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((chunk, i) => {
    const other = b[i];
    return chunk.startOffset === other.startOffset && chunk.endOffset === other.endOffset;
  });
}

/** Bytes que faltan por transferir de un chunk; null si su final es desconocido. */
export function remainingBytes(chunk: Chunk): number | null {
  if (chunk.endOffset === null) return null;
  return chunk.endOffset - chunk.startOffset - chunk.bytesWritten;
}
