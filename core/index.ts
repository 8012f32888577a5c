/**
 * API de biblioteca de rangefetch: motor, planificador de lotes y servicio.
 *
 * @module rangefetch
 */

export * from './engines';
export { default as DownloadService, exitCodeFor, parseUrlList } from './services/DownloadService';
export type {
  DownloadServiceOptions,
  RunHooks,
  SingleDownloadOutcome,
  BatchDownloadOutcome,
} from './services/DownloadService';
export type { ServiceResponse } from './services/BaseService';
export { runCli } from './cli/program';
export { default as config } from './config';
export * from './utils';
export * from '../shared/types';
