/**
 * Planificador de lotes: ejecuta tareas bajo un límite global de concurrencia.
 *
 * El límite del lote (concurrency_limit) es independiente del worker_count de cada
 * tarea; el uso total de conexiones es concurrency_limit × max(worker_count).
 * Los resultados conservan el orden de envío. Con continueOnError = false el primer
 * resultado fallido cancela las tareas en vuelo y las que no empezaron, y el lote
 * termina aborted con resultados parciales.
 *
 * @module BatchScheduler
 */

import { logger } from '../utils/logger';
import { ERRORS } from '../constants/errors';
import { BatchStatus, TaskStatus } from '../../shared/types';
import type { BatchResult, BatchSummary, ProgressSnapshot, TaskResult } from '../../shared/types';
import { ConcurrencyController } from './ConcurrencyController';
import { isAbortError } from './DownloadError';
import type { DownloadEngine } from './DownloadEngine';
import type { DownloadTask } from './types';

const log = logger.child('BatchScheduler');

export interface BatchRunOptions {
  concurrencyLimit: number;
  continueOnError: boolean;
  signal?: AbortSignal;
  onTaskStart?: (_task: DownloadTask, _index: number) => void;
  onTaskProgress?: (_snapshot: ProgressSnapshot, _index: number) => void;
  onTaskResult?: (_result: TaskResult, _index: number) => void;
}

/** Resultado de una tarea que nunca llegó a ejecutarse. */
function notStartedResult(task: DownloadTask): TaskResult {
  return {
    taskId: task.id,
    url: task.url,
    destinationPath: null,
    status: TaskStatus.ABORTED,
    bytesTransferred: 0,
    totalBytes: 0,
    durationMs: 0,
    resumed: false,
    chunkCount: 0,
  };
}

export function summarizeResults(results: readonly TaskResult[], durationMs: number): BatchSummary {
  const summary: BatchSummary = {
    total: results.length,
    succeeded: 0,
    failed: 0,
    aborted: 0,
    totalBytes: 0,
    durationMs,
  };
  for (const result of results) {
    if (result.status === TaskStatus.SUCCESS) {
      summary.succeeded++;
      summary.totalBytes += result.totalBytes;
    } else if (result.status === TaskStatus.FAILED) {
      summary.failed++;
    } else {
      summary.aborted++;
    }
  }
  return summary;
}

export class BatchScheduler {
  private _peakActive = 0;

  constructor(private readonly engine: DownloadEngine) {}

  /** Máximo de tareas simultáneas de la última ejecución. */
  get peakActive(): number {
    return this._peakActive;
  }

  async run(tasks: readonly DownloadTask[], options: BatchRunOptions): Promise<BatchResult> {
    const startedAt = Date.now();
    const limiter = new ConcurrencyController(options.concurrencyLimit);
    const batchAbort = new AbortController();
    const external = options.signal;
    const forwardAbort = (): void => batchAbort.abort();
    if (external?.aborted) batchAbort.abort();
    else external?.addEventListener('abort', forwardAbort, { once: true });

    const results: Array<TaskResult | null> = tasks.map(() => null);
    let stoppedByFailure = false;

    log.info(
      `Lote de ${tasks.length} tareas (concurrencia ${limiter.limit}, ${
        options.continueOnError ? 'continúa ante errores' : 'aborta ante el primer fallo'
      })`
    );

    const runOne = async (task: DownloadTask, index: number): Promise<void> => {
      let release: () => void;
      try {
        release = await limiter.acquire(batchAbort.signal);
      } catch (error) {
        if (!isAbortError(error)) throw error;
        log.debug(`${ERRORS.BATCH.NOT_STARTED}: ${task.url}`);
        const skipped = notStartedResult(task);
        results[index] = skipped;
        options.onTaskResult?.(skipped, index);
        return;
      }

      try {
        options.onTaskStart?.(task, index);
        const result = await this.engine.download(task, {
          signal: batchAbort.signal,
          onProgress: options.onTaskProgress
            ? snapshot => options.onTaskProgress?.(snapshot, index)
            : undefined,
        });
        results[index] = result;
        options.onTaskResult?.(result, index);

        if (result.status === TaskStatus.FAILED && !options.continueOnError && !stoppedByFailure) {
          stoppedByFailure = true;
          log.warn(`${ERRORS.BATCH.ABORTED}: ${task.url}`);
          batchAbort.abort();
        }
      } finally {
        release();
      }
    };

    try {
      await Promise.all(tasks.map((task, index) => runOne(task, index)));
    } finally {
      external?.removeEventListener('abort', forwardAbort);
    }

    this._peakActive = limiter.peakActive;
    const finalResults = results.map((result, index) => result ?? notStartedResult(tasks[index]));
    const summary = summarizeResults(finalResults, Date.now() - startedAt);
    const status = stoppedByFailure || external?.aborted ? BatchStatus.ABORTED : BatchStatus.COMPLETED;

    log.info(
      `Lote ${status}: ${summary.succeeded} correctas, ${summary.failed} fallidas, ${summary.aborted} canceladas`
    );
    return { status, results: finalResults, summary };
  }
}

export default BatchScheduler;
