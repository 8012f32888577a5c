/**
 * Lógica de negocio de las tres órdenes del CLI: descarga simple, acelerada y por lotes.
 *
 * Valida parámetros con zod, traduce las opciones de petición a EngineSettings, crea las
 * tareas y calcula el código de salida. Es dueño del ResumeStore (abre en initialize(),
 * cierra en destroy()) y del EventBus al que se suscribe el renderer.
 *
 * @module DownloadService
 */

import { promises as fs } from 'fs';
import BaseService from './BaseService';
import type { ServiceResponse } from './BaseService';
import config from '../config';
import { ERRORS } from '../constants/errors';
import {
  validateSingleDownloadParams,
  validateAcceleratedDownloadParams,
  validateBatchDownloadParams,
} from '../utils/schemas';
import type { ReportFormat } from '../utils/schemas';
import { TaskStatus } from '../../shared/types';
import type { BatchResult, ProgressSnapshot, TaskResult } from '../../shared/types';
import { DownloadEngine, createDownloadTask } from '../engines/DownloadEngine';
import { BatchScheduler } from '../engines/BatchScheduler';
import { ResumeStore } from '../engines/ResumeStore';
import EventBus from '../engines/EventBus';
import { errorMessage } from '../utils/errorHelpers';
import type { HttpTransport } from '../engines/HttpTransport';
import type { DownloadTask, EngineSettings, ExpectedChecksum } from '../engines/types';

/** Código de salida por parámetros inválidos. */
export const EXIT_INVALID_INPUT = 2;
const MAX_EXIT_CODE = 125;

/** 0 si todo terminó en success; si no, el número de tareas no exitosas (máx. 125). */
export function exitCodeFor(results: readonly TaskResult[]): number {
  const unsuccessful = results.filter(r => r.status !== TaskStatus.SUCCESS).length;
  return Math.min(unsuccessful, MAX_EXIT_CODE);
}

/** Una URL por línea; se ignoran líneas vacías y comentarios (#). */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

interface RequestOptions {
  timeout?: number;
  retries?: number;
  userAgent?: string;
}

/** Traduce --timeout (segundos), --retries y --user-agent a overrides del motor. */
export function requestSettings(options: RequestOptions): EngineSettings {
  const settings: EngineSettings = {};
  if (options.timeout !== undefined) {
    const ms = Math.round(options.timeout * 1000);
    settings.connectTimeout = ms;
    settings.idleTimeout = ms;
  }
  if (options.retries !== undefined) settings.maxAttempts = options.retries + 1;
  if (options.userAgent !== undefined) settings.userAgent = options.userAgent;
  return settings;
}

export interface DownloadServiceOptions {
  transport?: HttpTransport;
  store?: ResumeStore;
  events?: EventBus;
  /** Overrides base, se combinan con los de cada petición. */
  settings?: EngineSettings;
}

export interface RunHooks {
  signal?: AbortSignal;
  onProgress?: (_snapshot: ProgressSnapshot, _index: number) => void;
  onTaskStart?: (_task: DownloadTask, _index: number) => void;
  onTaskResult?: (_result: TaskResult, _index: number) => void;
}

export interface SingleDownloadOutcome {
  result: TaskResult;
  exitCode: number;
  quiet: boolean;
}

export interface BatchDownloadOutcome {
  result: BatchResult;
  exitCode: number;
  format: ReportFormat;
  quiet: boolean;
}

interface TaskRequest {
  url: string;
  output?: string;
  checksum?: ExpectedChecksum;
  workers: number;
  resume: boolean;
  maxSize?: number;
  overwrite: boolean;
  deleteOnMismatch: boolean;
  headers: Record<string, string>;
  timeout?: number;
  retries?: number;
  userAgent?: string;
  quiet: boolean;
}

export default class DownloadService extends BaseService {
  readonly events: EventBus;
  private readonly store: ResumeStore;
  private readonly transport?: HttpTransport;
  private readonly baseSettings: EngineSettings;

  constructor(options: DownloadServiceOptions = {}) {
    super('DownloadService');
    this.store = options.store ?? new ResumeStore(config.paths.resumeDbPath);
    this.transport = options.transport;
    this.events = options.events ?? new EventBus();
    this.baseSettings = options.settings ?? {};
  }

  async initialize(): Promise<void> {
    if (!this.store.initialize()) {
      throw new Error(ERRORS.RESUME.INIT_FAILED);
    }
    await super.initialize();
  }

  async destroy(): Promise<void> {
    this.store.close();
    await super.destroy();
  }

  /** Descarga simple (por defecto un worker; --workers para dividir). */
  async downloadSingle(
    params: unknown,
    hooks: RunHooks = {}
  ): Promise<ServiceResponse<SingleDownloadOutcome>> {
    const validation = validateSingleDownloadParams(params);
    if (!validation.success || !validation.data) {
      return this.failure(validation.error ?? ERRORS.GENERAL.INVALID_INPUT, 'INVALID_INPUT', 'downloadSingle');
    }
    return this._runSingle(validation.data, hooks, 'downloadSingle');
  }

  /** Descarga acelerada con un número explícito de partes. */
  async downloadAccelerated(
    params: unknown,
    hooks: RunHooks = {}
  ): Promise<ServiceResponse<SingleDownloadOutcome>> {
    const validation = validateAcceleratedDownloadParams(params);
    if (!validation.success || !validation.data) {
      return this.failure(
        validation.error ?? ERRORS.GENERAL.INVALID_INPUT,
        'INVALID_INPUT',
        'downloadAccelerated'
      );
    }
    const { parts, ...rest } = validation.data;
    return this._runSingle({ ...rest, workers: parts }, hooks, 'downloadAccelerated');
  }

  /** Lote desde un archivo de URLs. */
  async downloadBatchFromFile(
    urlsFile: string,
    params: Record<string, unknown>,
    hooks: RunHooks = {}
  ): Promise<ServiceResponse<BatchDownloadOutcome>> {
    let text: string;
    try {
      text = await fs.readFile(urlsFile, 'utf8');
    } catch (error) {
      const reason = errorMessage(error);
      return this.failure(
        `${ERRORS.FILE.URLS_FILE_READ_FAILED}: ${reason}`,
        'URLS_FILE_READ_FAILED',
        'downloadBatchFromFile'
      );
    }
    const urls = parseUrlList(text);
    if (urls.length === 0) {
      return this.failure(`${ERRORS.FILE.URLS_FILE_EMPTY}: ${urlsFile}`, 'URLS_FILE_EMPTY', 'downloadBatchFromFile');
    }
    return this.downloadBatch({ ...params, urls }, hooks);
  }

  /** Lote de URLs bajo un límite global de concurrencia. */
  async downloadBatch(
    params: unknown,
    hooks: RunHooks = {}
  ): Promise<ServiceResponse<BatchDownloadOutcome>> {
    const validation = validateBatchDownloadParams(params);
    if (!validation.success || !validation.data) {
      return this.failure(validation.error ?? ERRORS.GENERAL.INVALID_INPUT, 'INVALID_INPUT', 'downloadBatch');
    }
    const data = validation.data;

    try {
      const engine = this._createEngine(requestSettings(data));
      const tasks = data.urls.map(url =>
        createDownloadTask({
          url,
          outputDir: data.outputDir ?? process.cwd(),
          workerCount: data.parts,
          maxBytes: data.maxSize ?? null,
          overwrite: data.overwrite,
          resume: data.resume,
          deleteOnMismatch: data.deleteOnMismatch,
          headers: data.headers,
        })
      );
      const scheduler = new BatchScheduler(engine);
      const result = await scheduler.run(tasks, {
        concurrencyLimit: data.concurrency,
        continueOnError: data.continueOnError,
        signal: hooks.signal,
        onTaskStart: hooks.onTaskStart,
        onTaskProgress: hooks.onProgress,
        onTaskResult: hooks.onTaskResult,
      });
      return this.success({
        result,
        exitCode: exitCodeFor(result.results),
        format: data.format,
        quiet: data.quiet,
      });
    } catch (error) {
      return this.handleError(error, 'downloadBatch');
    }
  }

  private _createEngine(requestOverrides: EngineSettings): DownloadEngine {
    return new DownloadEngine({
      store: this.store,
      transport: this.transport,
      events: this.events,
      settings: { ...this.baseSettings, ...requestOverrides },
    });
  }

  private async _runSingle(
    request: TaskRequest,
    hooks: RunHooks,
    context: string
  ): Promise<ServiceResponse<SingleDownloadOutcome>> {
    try {
      const engine = this._createEngine(requestSettings(request));
      const task = createDownloadTask({
        url: request.url,
        destinationPath: request.output ?? null,
        expectedChecksum: request.checksum ?? null,
        workerCount: request.workers,
        maxBytes: request.maxSize ?? null,
        overwrite: request.overwrite,
        resume: request.resume,
        deleteOnMismatch: request.deleteOnMismatch,
        headers: request.headers,
      });
      hooks.onTaskStart?.(task, 0);
      const result = await engine.download(task, {
        signal: hooks.signal,
        onProgress: hooks.onProgress ? snapshot => hooks.onProgress?.(snapshot, 0) : undefined,
      });
      hooks.onTaskResult?.(result, 0);
      return this.success({ result, exitCode: exitCodeFor([result]), quiet: request.quiet });
    } catch (error) {
      return this.handleError(error, context);
    }
  }
}
