/**
 * Motor de descargas: orquesta una tarea de principio a fin.
 *
 * Flujo: sondeo (RangeResolver) → límite de tamaño → nombre (NameResolver) → plan
 * (ChunkPlanner) o reanudación validada (ResumeStore) → WorkerPool → verificación
 * (Verifier) → TaskResult. Un 200 a un Range en multi-part reinicia una vez en
 * single-stream; un 416 descarta el registro, vuelve a sondear y reinicia una vez.
 *
 * Cada instancia posee su EventBus y sus ajustes; no hay estado de proceso compartido.
 *
 * @module DownloadEngine
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import config from '../config';
import { ERRORS } from '../constants/errors';
import { logger } from '../utils/logger';
import { ensureDirectoryExists, pathExists, safeUnlink } from '../utils/fileHelpers';
import { ErrorKind, TaskStatus } from '../../shared/types';
import type { ProgressSnapshot, TaskResult, TaskError, TaskStatusType } from '../../shared/types';
import { TaskState } from './types';
import type {
  Chunk,
  DownloadTask,
  DownloadTaskInput,
  EngineSettings,
  ResolvedEngineSettings,
} from './types';
import { transitionTask, isTerminalState } from './DownloadStateMachine';
import { DownloadError, isAbortError } from './DownloadError';
import { toDownloadError, isRangeNotSatisfiable } from './DownloadValidator';
import { NodeHttpTransport } from './HttpTransport';
import type { HttpTransport } from './HttpTransport';
import { RangeResolver } from './RangeResolver';
import type { ProbeResult } from './RangeResolver';
import { planChunks, planSingleStream } from './ChunkPlanner';
import { ResumeStore } from './ResumeStore';
import { ResumeWriter } from './ResumeWriter';
import { checkResumeCompatibility } from './ResumeCompatibility';
import { WorkerPool } from './WorkerPool';
import { ProgressAggregator } from './ProgressAggregator';
import Verifier, { IncrementalDigest } from './Verifier';
import { resolveDestination } from './NameResolver';
import EventBus from './EventBus';

const log = logger.child('DownloadEngine');

const MAX_PATH_ATTEMPTS = 10;

export function resolveEngineSettings(overrides: EngineSettings = {}): ResolvedEngineSettings {
  return {
    connectTimeout: overrides.connectTimeout ?? config.network.connectTimeout,
    idleTimeout: overrides.idleTimeout ?? config.network.idleTimeout,
    maxRedirects: overrides.maxRedirects ?? config.network.maxRedirects,
    userAgent: overrides.userAgent ?? config.network.userAgent,
    retryAfterMaxMs: overrides.retryAfterMaxMs ?? config.network.retryAfterMaxMs,
    maxAttempts: overrides.maxAttempts ?? config.retry.maxAttempts,
    baseDelayMs: overrides.baseDelayMs ?? config.retry.baseDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? config.retry.maxDelayMs,
    jitterFactor: overrides.jitterFactor ?? config.retry.jitterFactor,
    minChunkSize: overrides.minChunkSize ?? config.downloads.minChunkSize,
    maxWorkerCount: overrides.maxWorkerCount ?? config.downloads.maxWorkerCount,
    progressIntervalMs: overrides.progressIntervalMs ?? config.downloads.progressIntervalMs,
    resumeFlushIntervalMs: overrides.resumeFlushIntervalMs ?? config.downloads.resumeFlushIntervalMs,
    resumeFlushBytes: overrides.resumeFlushBytes ?? config.downloads.resumeFlushBytes,
    preallocateFile: overrides.preallocateFile ?? config.downloads.preallocateFile,
  };
}

/** Crea una tarea en estado pending con valores por defecto. */
export function createDownloadTask(input: DownloadTaskInput): DownloadTask {
  return {
    id: crypto.randomUUID(),
    url: input.url,
    destinationPath: input.destinationPath ?? null,
    outputDir: input.outputDir ?? process.cwd(),
    expectedSize: null,
    supportsRange: false,
    expectedChecksum: input.expectedChecksum ?? null,
    workerCount: Math.max(1, input.workerCount ?? 1),
    state: TaskState.PENDING,
    maxBytes: input.maxBytes ?? null,
    overwrite: input.overwrite ?? false,
    resume: input.resume ?? false,
    deleteOnMismatch: input.deleteOnMismatch ?? config.downloads.deleteOnChecksumMismatch,
    headers: input.headers ?? {},
  };
}

export interface DownloadEngineOptions {
  store: ResumeStore;
  transport?: HttpTransport;
  settings?: EngineSettings;
  events?: EventBus;
  verifier?: Verifier;
}

export interface DownloadRunOptions {
  signal?: AbortSignal;
  /** Agregador propio del llamador; si no se pasa, el motor crea uno. */
  progress?: ProgressAggregator;
  onProgress?: (_snapshot: ProgressSnapshot) => void;
}

/** Estado de una ejecución que alimenta el TaskResult. */
interface RunState {
  destinationPath: string | null;
  resumed: boolean;
  chunkCount: number;
  finalSize: number;
  checksumVerified?: boolean;
  /** Se abrió el archivo de destino (hay algo que limpiar en size_limit). */
  fileTouched: boolean;
}

interface TransferOutcome {
  chunks: Chunk[];
  digest: IncrementalDigest | null;
  finalSize: number;
}

export class DownloadEngine {
  readonly events: EventBus;
  readonly settings: ResolvedEngineSettings;
  private readonly store: ResumeStore;
  private readonly transport: HttpTransport;
  private readonly resolver: RangeResolver;
  private readonly verifier: Verifier;
  /** Rutas reservadas por tareas en curso de esta instancia (batch concurrente). */
  private readonly activePaths = new Set<string>();

  constructor(options: DownloadEngineOptions) {
    this.store = options.store;
    this.transport = options.transport ?? new NodeHttpTransport();
    this.settings = resolveEngineSettings(options.settings);
    this.events = options.events ?? new EventBus();
    this.verifier = options.verifier ?? new Verifier();
    this.resolver = new RangeResolver(this.transport, this.settings);
  }

  /** Ejecuta la tarea y devuelve su único TaskResult. Nunca lanza. */
  async download(task: DownloadTask, options: DownloadRunOptions = {}): Promise<TaskResult> {
    const startedAt = Date.now();
    const signal = options.signal ?? new AbortController().signal;
    const progress =
      options.progress ??
      new ProgressAggregator(task.id, task.url, { intervalMs: this.settings.progressIntervalMs });
    const unsubscribe = options.onProgress ? progress.onProgress(options.onProgress) : null;
    const run: RunState = {
      destinationPath: null,
      resumed: false,
      chunkCount: 0,
      finalSize: 0,
      fileTouched: false,
    };

    const endOperation = log.startOperation(`descarga ${task.url}`);
    let status: TaskStatusType = TaskStatus.SUCCESS;
    let taskError: TaskError | undefined;

    try {
      if (!this.store.isInitialized && !this.store.initialize()) {
        throw new DownloadError(ErrorKind.INTERNAL, ERRORS.RESUME.INIT_FAILED, { code: 'RESUME_INIT_FAILED' });
      }
      transitionTask(task, TaskState.PLANNING);
      await this._execute(task, progress, signal, run);
      transitionTask(task, TaskState.DONE);
    } catch (error) {
      if (isAbortError(error) || (signal.aborted && !(error instanceof DownloadError))) {
        status = TaskStatus.ABORTED;
        if (!isTerminalState(task.state)) transitionTask(task, TaskState.ABORTED);
      } else {
        const downloadError = toDownloadError(error);
        status = TaskStatus.FAILED;
        taskError = downloadError.toTaskError();
        if (!isTerminalState(task.state)) transitionTask(task, TaskState.FAILED);
        if (downloadError.kind === ErrorKind.INTERNAL) {
          log.error(`Error interno en ${task.url}:`, error);
        }
      }
    } finally {
      progress.stop();
      unsubscribe?.();
    }

    const result: TaskResult = {
      taskId: task.id,
      url: task.url,
      destinationPath: run.destinationPath,
      status,
      bytesTransferred: progress.sessionBytes,
      totalBytes: status === TaskStatus.SUCCESS ? run.finalSize : progress.completedBytes,
      durationMs: Date.now() - startedAt,
      resumed: run.resumed,
      chunkCount: run.chunkCount,
      ...(taskError ? { error: taskError } : {}),
      ...(run.checksumVerified !== undefined ? { checksumVerified: run.checksumVerified } : {}),
    };

    endOperation(taskError ? `${status} (${taskError.kind}: ${taskError.message})` : status);
    this.events.emitTaskFinished(result);
    return result;
  }

  private _applyProbe(task: DownloadTask, probe: ProbeResult): void {
    task.expectedSize = probe.size;
    task.supportsRange = probe.supportsRange;
    if (task.maxBytes !== null && probe.size !== null && probe.size > task.maxBytes) {
      throw new DownloadError(
        ErrorKind.SIZE_LIMIT_EXCEEDED,
        `${ERRORS.DOWNLOAD.SIZE_LIMIT_EXCEEDED} (${probe.size} > ${task.maxBytes} bytes)`,
        { code: 'SIZE_LIMIT_EXCEEDED' }
      );
    }
  }

  private async _execute(
    task: DownloadTask,
    progress: ProgressAggregator,
    signal: AbortSignal,
    run: RunState
  ): Promise<void> {
    const probe = await this.resolver.probe(task.url, task.headers, signal);
    this._applyProbe(task, probe);

    let destPath = await this._resolvePath(task, probe);
    // Otra tarea pudo reservar la misma ruta mientras se comprobaba el disco
    for (let attempt = 1; this.activePaths.has(destPath) && !task.overwrite; attempt++) {
      if (attempt > MAX_PATH_ATTEMPTS) {
        throw new DownloadError(ErrorKind.DISK, `${ERRORS.FILE.NO_FREE_NAME}: ${destPath}`, {
          code: 'NO_FREE_NAME',
        });
      }
      destPath = await this._resolvePath(task, probe);
    }
    run.destinationPath = destPath;
    this.activePaths.add(destPath);
    try {
      await this._transferAndVerify(task, destPath, progress, signal, run);
    } finally {
      this.activePaths.delete(destPath);
    }
  }

  private async _resolvePath(task: DownloadTask, probe: ProbeResult): Promise<string> {
    const destination = await resolveDestination({
      url: task.url,
      finalUrl: probe.finalUrl,
      suggestedName: probe.suggestedName,
      explicitPath: task.destinationPath,
      outputDir: task.outputDir,
      overwrite: task.overwrite,
      resume: task.resume,
      hasResumeRecord: p => this.store.hasRecord(task.url, p),
      isReserved: p => this.activePaths.has(p),
      isTaken: async p => this.activePaths.has(p) || (await pathExists(p)),
    });
    return destination.path;
  }

  private async _transferAndVerify(
    task: DownloadTask,
    destPath: string,
    progress: ProgressAggregator,
    signal: AbortSignal,
    run: RunState
  ): Promise<void> {
    try {
      await ensureDirectoryExists(path.dirname(destPath));
    } catch (error) {
      throw new DownloadError(ErrorKind.DISK, `${ERRORS.FILE.CREATE_DIRECTORY_FAILED}: ${path.dirname(destPath)}`, {
        code: 'CREATE_DIRECTORY_FAILED',
        cause: error,
      });
    }

    let forceSingle = false;
    let reprobed = false;
    let allowResume = task.resume;
    let outcome: TransferOutcome;

    for (;;) {
      try {
        outcome = await this._transfer(task, destPath, progress, signal, run, forceSingle, allowResume);
        break;
      } catch (error) {
        if (isAbortError(error)) throw error;
        const downloadError = toDownloadError(error);

        if (downloadError.kind === ErrorKind.RANGE_UNSUPPORTED && !forceSingle) {
          log.warn(`El servidor ignora Range en ${task.url}; se reinicia en single-stream`);
          this.store.delete(task.url, destPath);
          this.events.emitDowngraded(task.id, downloadError.message);
          forceSingle = true;
          allowResume = false;
          transitionTask(task, TaskState.PLANNING);
          continue;
        }

        if (isRangeNotSatisfiable(downloadError) && !reprobed) {
          log.warn(`416 en ${task.url}; se descarta el registro y se vuelve a sondear`);
          this.store.delete(task.url, destPath);
          reprobed = true;
          allowResume = false;
          transitionTask(task, TaskState.PLANNING);
          this._applyProbe(task, await this.resolver.probe(task.url, task.headers, signal));
          continue;
        }

        if (downloadError.kind === ErrorKind.SIZE_LIMIT_EXCEEDED && run.fileTouched) {
          this.store.delete(task.url, destPath);
          await safeUnlink(destPath);
        }
        throw downloadError;
      }
    }

    await this._verify(task, destPath, outcome, run);
  }

  /** Planifica o reanuda, abre el archivo y corre el WorkerPool. */
  private async _transfer(
    task: DownloadTask,
    destPath: string,
    progress: ProgressAggregator,
    signal: AbortSignal,
    run: RunState,
    forceSingle: boolean,
    allowResume: boolean
  ): Promise<TransferOutcome> {
    const size = task.expectedSize;
    const workerCount = Math.min(task.workerCount, this.settings.maxWorkerCount);
    const rangedPlan = !forceSingle && task.supportsRange && size !== null && size > 0;
    let chunks = rangedPlan
      ? planChunks(size, workerCount, this.settings.minChunkSize)
      : planSingleStream(size);
    const multiPart = chunks.length > 1;
    const checksumAlgorithm = task.expectedChecksum?.algorithm ?? null;

    if (workerCount > 1 && !multiPart) {
      const reason = forceSingle
        ? ERRORS.DOWNLOAD.RANGE_IGNORED
        : size === null
          ? ERRORS.DOWNLOAD.UNKNOWN_SIZE
          : task.supportsRange
            ? 'Recurso demasiado pequeño para dividir'
            : 'El servidor no acepta peticiones Range';
      log.info(`${task.url}: single-stream (${reason})`);
      if (!forceSingle) this.events.emitDowngraded(task.id, reason);
    }

    let resumed = false;
    if (allowResume) {
      const record = this.store.load(task.url, destPath);
      if (record) {
        const verdict = await checkResumeCompatibility(record, {
          url: task.url,
          destinationPath: destPath,
          expectedSize: size,
          supportsRange: task.supportsRange,
          workerCount: task.workerCount,
          checksumAlgorithm,
          plan: chunks,
        });
        if (verdict.compatible) {
          chunks = record.chunks;
          resumed = true;
          log.info(
            `Reanudando ${destPath}: ${chunks.reduce((s, c) => s + c.bytesWritten, 0)}/${size ?? '?'} bytes ya escritos`
          );
        } else {
          log.info(`Registro de reanudación descartado (${verdict.kind}): ${verdict.reason}`);
          this.store.delete(task.url, destPath);
        }
      }
    }

    run.resumed = resumed;
    run.chunkCount = chunks.length;
    progress.attach(chunks, size);

    let handle: FileHandle;
    try {
      handle = await fs.open(destPath, resumed ? 'r+' : 'w');
    } catch (error) {
      throw new DownloadError(ErrorKind.DISK, `${ERRORS.FILE.OPEN_FAILED}: ${destPath}`, {
        code: 'OPEN_FAILED',
        cause: error,
      });
    }
    run.fileTouched = true;

    try {
      if (chunks.length === 0) {
        transitionTask(task, TaskState.TRANSFERRING);
        return { chunks, digest: null, finalSize: 0 };
      }
      if (!resumed && multiPart && this.settings.preallocateFile && size !== null) {
        await handle.truncate(size);
      }

      const record = resumed
        ? null
        : this.store.create({
            url: task.url,
            destinationPath: destPath,
            expectedSize: size,
            supportsRange: task.supportsRange,
            checksumAlgorithm,
            workerCount: task.workerCount,
            chunks,
          });
      const writer = new ResumeWriter(
        this.store,
        record?.id ?? ResumeStore.recordId(task.url, destPath),
        handle,
        {
          flushIntervalMs: this.settings.resumeFlushIntervalMs,
          flushBytes: this.settings.resumeFlushBytes,
        }
      );
      const digest =
        !multiPart && task.expectedChecksum && chunks[0].bytesWritten === 0
          ? new IncrementalDigest(task.expectedChecksum.algorithm)
          : null;

      transitionTask(task, TaskState.TRANSFERRING);
      this.events.emitTaskStarted({
        taskId: task.id,
        url: task.url,
        destinationPath: destPath,
        expectedSize: size,
        chunkCount: chunks.length,
        resumed,
      });
      progress.start();

      const pool = new WorkerPool(
        chunks,
        {
          task,
          transport: this.transport,
          fileHandle: handle,
          settings: this.settings,
          multiPart,
          writer,
          progress,
          events: this.events,
          digest,
        },
        workerCount
      );
      await pool.run(signal);

      const last = chunks[chunks.length - 1];
      const finalSize = last.endOffset ?? last.startOffset + last.bytesWritten;
      // Single-stream rebobinado o archivo previo más largo: se recorta al tamaño real
      await handle.truncate(finalSize);
      return { chunks, digest, finalSize };
    } finally {
      await handle.close();
    }
  }

  private async _verify(
    task: DownloadTask,
    destPath: string,
    outcome: TransferOutcome,
    run: RunState
  ): Promise<void> {
    transitionTask(task, TaskState.VERIFYING);
    this.events.emitVerificationStarted(task.id);

    const precomputed =
      outcome.digest && outcome.digest.bytes === outcome.finalSize ? outcome.digest.digest() : null;
    const verification = await this.verifier.verifyFile(
      destPath,
      task.expectedSize,
      task.expectedChecksum,
      precomputed
    );
    run.finalSize = verification.actualSize ?? outcome.finalSize;

    if (!verification.valid) {
      // Un fallo de verificación no es reanudable
      this.store.delete(task.url, destPath);
      if (verification.hashValid === false) {
        run.checksumVerified = false;
        if (task.deleteOnMismatch) {
          await safeUnlink(destPath);
          log.info(`Archivo eliminado tras checksum incorrecto: ${destPath}`);
        }
        throw new DownloadError(ErrorKind.CHECKSUM_MISMATCH, ERRORS.DOWNLOAD.CHECKSUM_MISMATCH, {
          code: 'CHECKSUM_MISMATCH',
        });
      }
      throw new DownloadError(ErrorKind.INTERNAL, verification.error ?? ERRORS.DOWNLOAD.SIZE_MISMATCH, {
        code: 'SIZE_MISMATCH',
      });
    }

    if (task.expectedChecksum) run.checksumVerified = true;
    this.store.delete(task.url, destPath);
    log.info(`Descarga completada: ${destPath} (${run.finalSize} bytes)`);
  }
}

export default DownloadEngine;
