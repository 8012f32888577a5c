/**
 * @fileoverview Punto de entrada de tipos compartidos entre el motor y los renderers (CLI u otros).
 * @module shared/types
 */

export { ErrorKind, TaskStatus, BatchStatus } from './download';
export type {
  ErrorKindType,
  TaskStatusType,
  TaskError,
  TaskResult,
  ChunkProgress,
  ProgressSnapshot,
  BatchStatusType,
  BatchSummary,
  BatchResult,
} from './download';
