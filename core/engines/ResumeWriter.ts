/**
 * Escritor único del ResumeRecord de una tarea.
 *
 * Los workers notifican progreso; las escrituras a SQLite se serializan en una sola
 * cadena de promesas y se disparan por tiempo o volumen, no por byte. Cada flush
 * captura los valores, hace datasync del archivo destino y después aplica el merge,
 * de modo que lo persistido nunca supera lo que está físicamente en disco.
 *
 * @module ResumeWriter
 */

import type { FileHandle } from 'fs/promises';
import { ERRORS } from '../constants/errors';
import { logger } from '../utils/logger';
import { ChunkState } from './types';
import type { Chunk } from './types';
import type { ResumeStore, ChunkProgressUpdate } from './ResumeStore';

const log = logger.child('ResumeWriter');

export interface ResumeWriterOptions {
  flushIntervalMs: number;
  flushBytes: number;
  now?: () => number;
}

export class ResumeWriter {
  private readonly dirty = new Map<number, Chunk>();
  private chain: Promise<void> = Promise.resolve();
  private bytesSinceFlush = 0;
  private lastFlushAt: number;
  private readonly now: () => number;
  private _flushCount = 0;

  constructor(
    private readonly store: ResumeStore,
    readonly recordId: string,
    private readonly fileHandle: FileHandle,
    private readonly options: ResumeWriterOptions
  ) {
    this.now = options.now ?? Date.now;
    this.lastFlushAt = this.now();
  }

  /** Registra bytes escritos de un chunk; programa un flush si se supera algún umbral. */
  noteProgress(chunk: Chunk, bytes: number): void {
    this.dirty.set(chunk.id, chunk);
    this.bytesSinceFlush += bytes;
    if (
      this.bytesSinceFlush >= this.options.flushBytes ||
      this.now() - this.lastFlushAt >= this.options.flushIntervalMs
    ) {
      this.schedule();
    }
  }

  /** Marca un chunk como completo y programa un flush inmediato. */
  noteComplete(chunk: Chunk): void {
    this.dirty.set(chunk.id, chunk);
    this.schedule();
  }

  /**
   * Reinicia el progreso persistido de un chunk (el servidor respondió 200 a una
   * reanudación single-stream y se reescribe desde el byte 0).
   */
  resetChunk(chunk: Chunk): Promise<void> {
    this.dirty.delete(chunk.id);
    this.chain = this.chain.then(() => {
      try {
        this.store.resetChunk(this.recordId, chunk.id);
      } catch (error) {
        log.warn(`${ERRORS.RESUME.SAVE_FAILED}:`, error);
      }
    });
    return this.chain;
  }

  /** Encola un flush y espera a que la cadena quede vacía. */
  flush(): Promise<void> {
    this.schedule();
    return this.chain;
  }

  get flushCount(): number {
    return this._flushCount;
  }

  private schedule(): void {
    this.bytesSinceFlush = 0;
    this.lastFlushAt = this.now();
    this.chain = this.chain.then(() => this.doFlush());
  }

  private async doFlush(): Promise<void> {
    if (this.dirty.size === 0) return;
    const chunks = [...this.dirty.values()];
    const updates: ChunkProgressUpdate[] = chunks.map(chunk => ({
      chunkIndex: chunk.id,
      bytesWritten: chunk.bytesWritten,
      complete: chunk.status === ChunkState.COMPLETE,
    }));
    this.dirty.clear();

    try {
      await this.fileHandle.datasync();
      this.store.mergeProgress(this.recordId, updates);
      this._flushCount++;
    } catch (error) {
      // El registro queda por detrás de lo escrito: al reanudar solo se repiten bytes
      log.warn(`${ERRORS.RESUME.SAVE_FAILED}:`, error);
      for (const chunk of chunks) {
        if (!this.dirty.has(chunk.id)) this.dirty.set(chunk.id, chunk);
      }
    }
  }
}
