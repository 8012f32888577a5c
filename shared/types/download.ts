/**
 * Contrato de resultados y progreso del motor de descargas.
 *
 * Lo consumen el CLI y cualquier renderer: el motor no dibuja nada, solo emite
 * snapshots de progreso y devuelve un TaskResult inmutable por tarea.
 *
 * @module shared/types/download
 */

/** Clasificación cerrada de errores que puede llevar un TaskResult fallido. */
export const ErrorKind = Object.freeze({
  NETWORK: 'network',
  HTTP_CLIENT: 'http_client',
  HTTP_RATE_LIMIT_OR_SERVER: 'http_rate_limit_or_server',
  RANGE_UNSUPPORTED: 'range_unsupported',
  SIZE_LIMIT_EXCEEDED: 'size_limit_exceeded',
  CHECKSUM_MISMATCH: 'checksum_mismatch',
  DISK: 'disk',
  RESUME_INCOMPATIBLE: 'resume_incompatible',
  INTERNAL: 'internal',
} as const);

export type ErrorKindType = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Estado terminal de una tarea. */
export const TaskStatus = Object.freeze({
  SUCCESS: 'success',
  FAILED: 'failed',
  ABORTED: 'aborted',
} as const);

export type TaskStatusType = (typeof TaskStatus)[keyof typeof TaskStatus];

export interface TaskError {
  kind: ErrorKindType;
  message: string;
  code?: string;
  statusCode?: number;
}

export interface TaskResult {
  readonly taskId: string;
  readonly url: string;
  /** Ruta final del archivo; null si la tarea falló antes de resolverla. */
  readonly destinationPath: string | null;
  readonly status: TaskStatusType;
  /** Bytes recibidos por red en esta ejecución (no incluye lo ya descargado antes de reanudar). */
  readonly bytesTransferred: number;
  /** Tamaño del archivo en disco al terminar. */
  readonly totalBytes: number;
  readonly durationMs: number;
  readonly resumed: boolean;
  readonly chunkCount: number;
  readonly error?: TaskError;
  readonly checksumVerified?: boolean;
}

export interface ChunkProgress {
  index: number;
  state: string;
  bytesWritten: number;
  /** null cuando la longitud del chunk es desconocida (single-stream sin Content-Length). */
  totalBytes: number | null;
  progress: number | null;
}

/** Snapshot discreto de progreso emitido con cadencia acotada. */
export interface ProgressSnapshot {
  taskId: string;
  url: string;
  /** Bytes válidos en el archivo (incluye lo recuperado de un ResumeRecord). */
  completedBytes: number;
  /** Bytes recibidos por red en esta ejecución. */
  sessionBytes: number;
  expectedSize: number | null;
  speedBytesPerSec: number;
  /** Segundos restantes estimados, o null si no se puede estimar. */
  remainingTime: number | null;
  activeChunks: number;
  chunks: ChunkProgress[];
  timestamp: number;
}

export const BatchStatus = Object.freeze({
  COMPLETED: 'completed',
  ABORTED: 'aborted',
} as const);

export type BatchStatusType = (typeof BatchStatus)[keyof typeof BatchStatus];

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  aborted: number;
  totalBytes: number;
  durationMs: number;
}

export interface BatchResult {
  status: BatchStatusType;
  /** Mismo orden que las tareas enviadas. */
  results: TaskResult[];
  summary: BatchSummary;
}
