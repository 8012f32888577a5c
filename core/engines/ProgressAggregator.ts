/**
 * Agregador de progreso de una tarea.
 *
 * Lee los chunks vivos del plan (referencias que mutan los workers) y emite snapshots
 * discretos ('progress') con cadencia acotada. Lo crea quien llama al motor y se pasa al
 * WorkerPool; el renderer se suscribe sin intervenir en el flujo de control.
 *
 * @module ProgressAggregator
 */

import EventEmitter from 'events';
import { SpeedTracker } from './SpeedTracker';
import { isActiveChunkState } from './DownloadStateMachine';
import type { Chunk } from './types';
import type { ChunkProgress, ProgressSnapshot } from '../../shared/types';

export interface ProgressAggregatorOptions {
  intervalMs: number;
  speedTracker?: SpeedTracker;
}

export class ProgressAggregator extends EventEmitter {
  private readonly intervalMs: number;
  private readonly speedTracker: SpeedTracker;
  private chunks: readonly Chunk[] = [];
  private expectedSize: number | null = null;
  private _sessionBytes = 0;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    readonly taskId: string,
    readonly url: string,
    options: ProgressAggregatorOptions
  ) {
    super();
    this.intervalMs = Math.max(10, options.intervalMs);
    this.speedTracker = options.speedTracker ?? new SpeedTracker();
  }

  /**
   * Asocia el plan actual. Se vuelve a llamar si la tarea se replanifica
   * (paso a single-stream o re-sondeo tras 416).
   */
  attach(chunks: readonly Chunk[], expectedSize: number | null): void {
    this.chunks = chunks;
    this.expectedSize = expectedSize;
    this.speedTracker.start(this.completedBytes);
  }

  /** Bytes recibidos por red en esta ejecución. */
  addSessionBytes(n: number): void {
    this._sessionBytes += n;
  }

  get sessionBytes(): number {
    return this._sessionBytes;
  }

  get completedBytes(): number {
    return this.chunks.reduce((sum, c) => sum + c.bytesWritten, 0);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.emitSnapshot(), this.intervalMs);
    this.timer.unref();
  }

  /** Detiene la cadencia y emite un último snapshot. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.emitSnapshot();
  }

  onProgress(listener: (_snapshot: ProgressSnapshot) => void): () => void {
    this.on('progress', listener);
    return () => {
      this.off('progress', listener);
    };
  }

  snapshot(): ProgressSnapshot {
    const completedBytes = this.completedBytes;
    const { speedBytesPerSec, remainingTime } = this.speedTracker.update(
      completedBytes,
      this.expectedSize
    );
    const chunks: ChunkProgress[] = this.chunks.map(c => {
      const totalBytes = c.endOffset === null ? null : c.endOffset - c.startOffset;
      return {
        index: c.id,
        state: c.status,
        bytesWritten: c.bytesWritten,
        totalBytes,
        progress: totalBytes === null ? null : totalBytes === 0 ? 1 : c.bytesWritten / totalBytes,
      };
    });
    return {
      taskId: this.taskId,
      url: this.url,
      completedBytes,
      sessionBytes: this._sessionBytes,
      expectedSize: this.expectedSize,
      speedBytesPerSec,
      remainingTime,
      activeChunks: this.chunks.filter(c => isActiveChunkState(c.status)).length,
      chunks,
      timestamp: Date.now(),
    };
  }

  private emitSnapshot(): void {
    this.emit('progress', this.snapshot());
  }
}
