/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 *
 * Los engines importan logger por ruta directa (utils/logger) porque schemas depende
 * de engines/Verifier.
 */

export {
  logger,
  log,
  configureLogger,
  createScopedLogger,
  formatObject,
} from './logger';
export type { ScopedLogger, LogLevel } from './logger';

export { errnoCode, errorMessage, errorName } from './errorHelpers';

export * from './fileHelpers';

export * as schemas from './schemas';
export {
  validate,
  validateSingleDownloadParams,
  validateAcceleratedDownloadParams,
  validateBatchDownloadParams,
  validateSize,
} from './schemas';
export type {
  ZodValidationResult,
  SingleDownloadParams,
  AcceleratedDownloadParams,
  BatchDownloadParams,
  ReportFormat,
} from './schemas';
