/**
 * Tipos y constantes compartidos por el motor de descargas.
 *
 * Define estados de tarea y chunk, la tarea en memoria (DownloadTask), los chunks del
 * plan y los ajustes por instancia del motor (EngineSettings).
 *
 * @module engines/types
 */

/** Estados de una tarea de descarga. */
export const TaskState = Object.freeze({
  PENDING: 'pending',
  PLANNING: 'planning',
  TRANSFERRING: 'transferring',
  VERIFYING: 'verifying',
  DONE: 'done',
  FAILED: 'failed',
  ABORTED: 'aborted',
} as const);

export type TaskStateType = (typeof TaskState)[keyof typeof TaskState];

/** Estados de un chunk (rango de bytes) dentro de una tarea. */
export const ChunkState = Object.freeze({
  PENDING: 'pending',
  CONNECTING: 'connecting',
  STREAMING: 'streaming',
  COMPLETE: 'complete',
  FAILED: 'failed',
} as const);

export type ChunkStateType = (typeof ChunkState)[keyof typeof ChunkState];

/** Algoritmos de checksum aceptados, con la longitud hex de su digest. */
export const ChecksumAlgorithm = Object.freeze({
  MD5: 'md5',
  SHA1: 'sha1',
  SHA256: 'sha256',
  SHA512: 'sha512',
} as const);

export type ChecksumAlgorithmType = (typeof ChecksumAlgorithm)[keyof typeof ChecksumAlgorithm];

export const DIGEST_HEX_LENGTH: Readonly<Record<ChecksumAlgorithmType, number>> = Object.freeze({
  md5: 32,
  sha1: 40,
  sha256: 64,
  sha512: 128,
});

export interface ExpectedChecksum {
  algorithm: ChecksumAlgorithmType;
  /** Digest en hex, minúsculas. */
  digest: string;
}

/** Rango de bytes de una tarea. endOffset es exclusivo; null si el tamaño es desconocido. */
export interface Chunk {
  id: number;
  startOffset: number;
  endOffset: number | null;
  bytesWritten: number;
  status: ChunkStateType;
  attemptCount: number;
}

/**
 * Tarea de descarga. La crea quien llama (servicio o BatchScheduler) y solo la
 * muta el DownloadEngine que la ejecuta.
 */
export interface DownloadTask {
  id: string;
  url: string;
  /** Ruta explícita (archivo o directorio). null para derivar el nombre en el directorio de salida. */
  destinationPath: string | null;
  outputDir: string;
  expectedSize: number | null;
  supportsRange: boolean;
  expectedChecksum: ExpectedChecksum | null;
  workerCount: number;
  state: TaskStateType;
  /** Límite de tamaño en bytes; null sin límite. */
  maxBytes: number | null;
  overwrite: boolean;
  resume: boolean;
  deleteOnMismatch: boolean;
  headers: Record<string, string>;
}

/** Campos mínimos para crear una tarea; el resto toma valores por defecto. */
export interface DownloadTaskInput {
  url: string;
  destinationPath?: string | null;
  outputDir?: string;
  expectedChecksum?: ExpectedChecksum | null;
  workerCount?: number;
  maxBytes?: number | null;
  overwrite?: boolean;
  resume?: boolean;
  deleteOnMismatch?: boolean;
  headers?: Record<string, string>;
}

/** Overrides por instancia de la configuración global (flags del CLI, tests). */
export interface EngineSettings {
  connectTimeout?: number;
  idleTimeout?: number;
  maxRedirects?: number;
  userAgent?: string;
  retryAfterMaxMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  minChunkSize?: number;
  maxWorkerCount?: number;
  progressIntervalMs?: number;
  resumeFlushIntervalMs?: number;
  resumeFlushBytes?: number;
  preallocateFile?: boolean;
}

export type ResolvedEngineSettings = Required<EngineSettings>;
