/**
 * @fileoverview Punto de entrada de los engines.
 * @module engines
 */

export { DownloadEngine, createDownloadTask, resolveEngineSettings } from './DownloadEngine';
export type { DownloadEngineOptions, DownloadRunOptions } from './DownloadEngine';
export { BatchScheduler, summarizeResults } from './BatchScheduler';
export type { BatchRunOptions } from './BatchScheduler';
export { RangeResolver } from './RangeResolver';
export type { ProbeResult } from './RangeResolver';
export { planChunks, planSingleStream, effectiveWorkerCount, isSamePlan } from './ChunkPlanner';
export { WorkerPool } from './WorkerPool';
export { runChunk, parseContentRange, rangeHeaderFor } from './ChunkWorker';
export { ResumeStore } from './ResumeStore';
export type { ResumeRecord } from './ResumeStore';
export { ResumeWriter } from './ResumeWriter';
export { checkResumeCompatibility } from './ResumeCompatibility';
export type { ResumeVerdict } from './ResumeCompatibility';
export { default as Verifier, IncrementalDigest, parseChecksum } from './Verifier';
export {
  resolveDestination,
  deriveFilename,
  parseContentDisposition,
  nextAvailablePath,
} from './NameResolver';
export { ProgressAggregator } from './ProgressAggregator';
export { SpeedTracker } from './SpeedTracker';
export { ConcurrencyController } from './ConcurrencyController';
export { EventBus } from './EventBus';
export type { DownloadEventMap, DownloadEventName } from './EventBus';
export { NodeHttpTransport } from './HttpTransport';
export type { HttpTransport, HttpResponse, HttpRequestOptions } from './HttpTransport';
export { DownloadError, AbortedError, isAbortError } from './DownloadError';
export { toDownloadError, errorFromStatus, parseRetryAfter } from './DownloadValidator';
export { runWithRetry, calculateBackoffDelay } from './RetryPolicy';
export * from './types';
