/**
 * Ejecuta todos los chunks de una tarea con a lo sumo worker_count en vuelo.
 *
 * La tarea termina bien solo si todos los chunks llegan a Complete. El primer chunk que
 * queda Failed (o un range_unsupported) cancela a los hermanos de forma cooperativa; el
 * pool espera a que todos salgan y hace el último flush del ResumeRecord antes de
 * propagar el error, así el registro sigue describiendo el archivo.
 *
 * @module WorkerPool
 */

import { logger } from '../utils/logger';
import { ConcurrencyController } from './ConcurrencyController';
import { AbortedError, isAbortError } from './DownloadError';
import type { DownloadError } from './DownloadError';
import { toDownloadError } from './DownloadValidator';
import { runChunk } from './ChunkWorker';
import type { ChunkWorkerContext } from './ChunkWorker';
import { ChunkState } from './types';
import type { Chunk } from './types';

const log = logger.child('WorkerPool');

export type WorkerPoolContext = Omit<ChunkWorkerContext, 'signal'>;

export interface WorkerPoolResult {
  /** Máximo de workers simultáneos observado. */
  peakActive: number;
}

export class WorkerPool {
  private readonly limiter: ConcurrencyController;

  constructor(
    private readonly chunks: Chunk[],
    private readonly ctx: WorkerPoolContext,
    workerCount: number
  ) {
    this.limiter = new ConcurrencyController(workerCount);
  }

  /**
   * Corre los chunks pendientes. Lanza el primer DownloadError (tras cancelar a los
   * demás) o AbortedError si la señal externa se abortó.
   */
  async run(signal: AbortSignal): Promise<WorkerPoolResult> {
    const internal = new AbortController();
    const forwardAbort = (): void => internal.abort();
    if (signal.aborted) internal.abort();
    else signal.addEventListener('abort', forwardAbort, { once: true });

    const failures: DownloadError[] = [];
    const chunkCtx: ChunkWorkerContext = { ...this.ctx, signal: internal.signal };
    const pending = this.chunks.filter(c => c.status !== ChunkState.COMPLETE);

    log.debug(
      `Tarea ${this.ctx.task.id}: ${pending.length}/${this.chunks.length} chunks pendientes, ${this.limiter.limit} workers`
    );

    const runOne = async (chunk: Chunk): Promise<void> => {
      try {
        await this.limiter.run(() => runChunk(chunk, chunkCtx), internal.signal);
      } catch (error) {
        if (isAbortError(error)) return;
        failures.push(toDownloadError(error));
        if (failures.length === 1) {
          log.warn(`Chunk ${chunk.id} falló; cancelando el resto de la tarea ${this.ctx.task.id}`);
          internal.abort();
        }
      }
    };

    try {
      await Promise.all(pending.map(runOne));
    } finally {
      signal.removeEventListener('abort', forwardAbort);
      await this.ctx.writer.flush();
    }

    if (signal.aborted) throw new AbortedError();
    if (failures.length > 0) throw failures[0];
    return { peakActive: this.limiter.peakActive };
  }
}
