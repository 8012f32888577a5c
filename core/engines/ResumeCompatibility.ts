/**
 * Validación de un ResumeRecord cargado frente a la petición actual.
 *
 * Todo debe coincidir para reanudar; si no, la tarea empieza de cero. Un servidor que
 * dejó de aceptar Range se reporta como range_unsupported, el resto como
 * resume_incompatible. Ninguno de los dos llega al TaskResult.
 *
 * @module ResumeCompatibility
 */

import path from 'path';
import { statOrNull } from '../utils/fileHelpers';
import { ErrorKind } from '../../shared/types';
import type { ErrorKindType } from '../../shared/types';
import { isSamePlan } from './ChunkPlanner';
import type { Chunk, ChecksumAlgorithmType } from './types';
import type { ResumeRecord } from './ResumeStore';

export interface ResumeExpectations {
  url: string;
  destinationPath: string;
  expectedSize: number | null;
  supportsRange: boolean;
  workerCount: number;
  checksumAlgorithm: ChecksumAlgorithmType | null;
  /** Plan recién calculado para los parámetros actuales. */
  plan: readonly Chunk[];
}

export type ResumeVerdict =
  | { compatible: true }
  | { compatible: false; kind: ErrorKindType; reason: string };

function reject(reason: string, kind: ErrorKindType = ErrorKind.RESUME_INCOMPATIBLE): ResumeVerdict {
  return { compatible: false, kind, reason };
}

/** Mayor offset escrito según el registro. */
export function furthestWrittenByte(chunks: readonly Chunk[]): number {
  return chunks.reduce(
    (max, c) => (c.bytesWritten > 0 ? Math.max(max, c.startOffset + c.bytesWritten) : max),
    0
  );
}

export async function checkResumeCompatibility(
  record: ResumeRecord,
  expected: ResumeExpectations
): Promise<ResumeVerdict> {
  if (record.url !== expected.url || record.destinationPath !== path.resolve(expected.destinationPath)) {
    return reject('el registro pertenece a otra URL o destino');
  }
  if (record.expectedSize !== expected.expectedSize) {
    return reject(`tamaño distinto (${record.expectedSize ?? '?'} → ${expected.expectedSize ?? '?'})`);
  }
  if (record.supportsRange && !expected.supportsRange) {
    return reject('el servidor ya no acepta peticiones Range', ErrorKind.RANGE_UNSUPPORTED);
  }
  if (record.supportsRange !== expected.supportsRange) {
    return reject('cambió el soporte de Range del servidor');
  }
  if (record.workerCount !== expected.workerCount) {
    return reject(`worker_count distinto (${record.workerCount} → ${expected.workerCount})`);
  }
  if (record.checksumAlgorithm !== expected.checksumAlgorithm) {
    return reject('algoritmo de checksum distinto');
  }
  if (!isSamePlan(record.chunks, expected.plan)) {
    return reject('los límites de los chunks no coinciden con el plan actual');
  }
  const outOfRange = record.chunks.find(
    c => c.bytesWritten < 0 || (c.endOffset !== null && c.startOffset + c.bytesWritten > c.endOffset)
  );
  if (outOfRange) {
    return reject(`bytes escritos fuera del chunk ${outOfRange.id}`);
  }
  const stats = await statOrNull(expected.destinationPath);
  if (!stats || !stats.isFile()) {
    return reject('el archivo destino no existe');
  }
  const furthest = furthestWrittenByte(record.chunks);
  if (stats.size < furthest) {
    return reject(`el archivo destino es más corto (${stats.size}) que lo registrado (${furthest})`);
  }
  return { compatible: true };
}
