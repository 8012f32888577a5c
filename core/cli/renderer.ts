/**
 * Renderer de terminal: traduce eventos y snapshots del motor a texto.
 *
 * No interviene en el flujo de control; se suscribe al EventBus y al progreso. Las
 * funciones de formato son puras para poder probarlas sin terminal.
 *
 * @module cli/renderer
 */

import { TaskStatus } from '../../shared/types';
import type { BatchResult, ProgressSnapshot, TaskResult } from '../../shared/types';
import {
  SUCCESS_MESSAGES,
  INFO_MESSAGES,
  formatBatchCounts,
  formatChunkRetry,
  formatFallback,
  formatTaskStarted,
} from '../../shared/constants/messages';
import { formatBytes, formatDuration } from '../utils/fileHelpers';
import type EventBus from '../engines/EventBus';

/** Salida mínima que necesita el renderer (process.stdout o un buffer en tests). */
export interface OutputStream {
  write: (_chunk: string) => unknown;
  isTTY?: boolean;
}

export function formatSpeed(bytesPerSec: number): string {
  return `${formatBytes(bytesPerSec)}/s`;
}

/** "[ 45.0%] 4.5 MB / 10 MB  1.2 MB/s  ETA 5s"; sin tamaño conocido omite porcentaje y ETA. */
export function formatProgressLine(snapshot: ProgressSnapshot): string {
  const speed = formatSpeed(snapshot.speedBytesPerSec);
  if (snapshot.expectedSize === null || snapshot.expectedSize === 0) {
    return `${formatBytes(snapshot.completedBytes)}  ${speed}`;
  }
  const percent = Math.min(100, (snapshot.completedBytes / snapshot.expectedSize) * 100);
  const eta = snapshot.remainingTime === null ? '--' : formatDuration(snapshot.remainingTime);
  return `[${percent.toFixed(1).padStart(5)}%] ${formatBytes(snapshot.completedBytes)} / ${formatBytes(
    snapshot.expectedSize
  )}  ${speed}  ETA ${eta}`;
}

export function formatTaskError(result: TaskResult): string {
  if (result.status === TaskStatus.ABORTED) {
    return result.chunkCount === 0 && result.durationMs === 0 ? INFO_MESSAGES.NOT_STARTED : INFO_MESSAGES.CANCELLED;
  }
  if (!result.error) return '';
  const { statusCode, message } = result.error;
  const status = statusCode && !message.includes(String(statusCode)) ? ` (HTTP ${statusCode})` : '';
  return `${message}${status} [${result.error.kind}]`;
}

export function formatTaskSummary(result: TaskResult): string {
  if (result.status === TaskStatus.SUCCESS) {
    const seconds = result.durationMs / 1000;
    const checksum = result.checksumVerified ? `, ${SUCCESS_MESSAGES.CHECKSUM_VERIFIED.toLowerCase()}` : '';
    return `✓ ${SUCCESS_MESSAGES.DOWNLOAD_COMPLETED}: ${result.destinationPath ?? result.url} (${formatBytes(
      result.totalBytes
    )} en ${formatDuration(seconds)}${checksum})`;
  }
  return `✗ ${result.url}: ${formatTaskError(result)}`;
}

/** Informe tabular de un lote. */
export function formatBatchTable(batch: BatchResult): string {
  const { summary } = batch;
  const seconds = summary.durationMs / 1000;
  const average = seconds > 0 ? summary.totalBytes / seconds : 0;
  const lines = [
    '',
    batch.status === 'aborted' ? INFO_MESSAGES.BATCH_ABORTED : SUCCESS_MESSAGES.BATCH_COMPLETED,
    `  Total:            ${summary.total}`,
    `  Correctas:        ${summary.succeeded}`,
    `  Fallidas:         ${summary.failed}`,
    `  Canceladas:       ${summary.aborted}`,
    `  Tamaño total:     ${formatBytes(summary.totalBytes)}`,
    `  Tiempo total:     ${formatDuration(seconds)}`,
    `  Velocidad media:  ${formatSpeed(average)}`,
  ];
  const failed = batch.results.filter(r => r.status === TaskStatus.FAILED);
  if (failed.length > 0) {
    lines.push('', 'URLs fallidas:');
    for (const result of failed) {
      lines.push(`  - ${result.url}: ${formatTaskError(result)}`);
    }
  }
  return lines.join('\n');
}

/** Informe JSON de un lote (claves estables para scripts). */
export function formatBatchJson(batch: BatchResult): string {
  const report = {
    status: batch.status,
    total_urls: batch.summary.total,
    successful: batch.summary.succeeded,
    failed: batch.summary.failed,
    aborted: batch.summary.aborted,
    total_bytes: batch.summary.totalBytes,
    duration_ms: batch.summary.durationMs,
    results: batch.results.map(r => ({
      url: r.url,
      status: r.status,
      destination: r.destinationPath,
      bytes: r.totalBytes,
      duration_ms: r.durationMs,
      resumed: r.resumed,
      ...(r.checksumVerified !== undefined ? { checksum_verified: r.checksumVerified } : {}),
      ...(r.error ? { error: { kind: r.error.kind, message: r.error.message, code: r.error.code ?? null } } : {}),
    })),
  };
  return JSON.stringify(report, null, 2);
}

export interface TerminalRendererOptions {
  quiet: boolean;
  stdout?: OutputStream;
  stderr?: OutputStream;
}

export class TerminalRenderer {
  private readonly quiet: boolean;
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  /** Hay una línea de progreso sin terminar en la terminal. */
  private progressOpen = false;

  constructor(options: TerminalRendererOptions) {
    this.quiet = options.quiet;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  /** Se suscribe a los eventos del motor. Devuelve la función para desuscribirse. */
  attach(events: EventBus): () => void {
    const unsubscribers = [
      events.subscribe('taskStarted', e => this.info(formatTaskStarted(e.destinationPath, e.chunkCount, e.resumed))),
      events.subscribe('downgraded', e => this.info(formatFallback(e.reason))),
      events.subscribe('chunkFailed', e => {
        if (e.willRetry) this.info(formatChunkRetry(e.chunkIndex, e.error));
      }),
      events.subscribe('verificationStarted', () => this.info(INFO_MESSAGES.VERIFYING)),
    ];
    return () => unsubscribers.forEach(unsubscribe => unsubscribe());
  }

  /** Progreso en sitio; solo en terminales interactivas. */
  progress(snapshot: ProgressSnapshot, label = ''): void {
    if (this.quiet || !this.stdout.isTTY) return;
    const prefix = label ? `${label} ` : '';
    this.stdout.write(`\r\x1b[2K${prefix}${formatProgressLine(snapshot)}`);
    this.progressOpen = true;
  }

  info(message: string): void {
    if (this.quiet) return;
    this.closeProgress();
    this.stdout.write(`${message}\n`);
  }

  error(message: string): void {
    this.closeProgress();
    this.stderr.write(`${message}\n`);
  }

  taskResult(result: TaskResult): void {
    if (result.status === TaskStatus.SUCCESS) {
      this.info(formatTaskSummary(result));
    } else {
      this.error(formatTaskSummary(result));
    }
  }

  /** El JSON siempre se imprime (también en modo silencioso). */
  batchReport(batch: BatchResult, format: 'table' | 'json'): void {
    this.closeProgress();
    if (format === 'json') {
      this.stdout.write(`${formatBatchJson(batch)}\n`);
      return;
    }
    if (!this.quiet) this.stdout.write(`${formatBatchTable(batch)}\n`);
    else this.stdout.write(`${formatBatchCounts(batch.summary.succeeded, batch.summary.failed, batch.summary.aborted)}\n`);
  }

  private closeProgress(): void {
    if (this.progressOpen) {
      this.stdout.write('\n');
      this.progressOpen = false;
    }
  }
}
