/**
 * Semáforo asíncrono con límite explícito.
 *
 * El WorkerPool lo usa para acotar chunks en vuelo por tarea (worker_count) y el
 * BatchScheduler para acotar tareas activas (concurrency_limit): dos límites
 * independientes que se componen. peakActive queda para diagnóstico y tests.
 *
 * @module ConcurrencyController
 */

import { AbortedError } from './DownloadError';

interface Waiter {
  resolve: (_release: () => void) => void;
  reject: (_error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class ConcurrencyController {
  private readonly _limit: number;
  private _active = 0;
  private _peakActive = 0;
  private readonly _waiters: Waiter[] = [];

  constructor(limit: number) {
    this._limit = Math.max(1, Math.floor(limit));
  }

  /**
   * Espera un slot libre. Devuelve la función que lo libera (idempotente).
   * Rechaza con AbortedError si la señal se aborta mientras espera.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new AbortedError());
    }
    if (this._active < this._limit) {
      return Promise.resolve(this._grant());
    }
    return new Promise<() => void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = this._waiters.indexOf(waiter);
          if (idx >= 0) this._waiters.splice(idx, 1);
          reject(new AbortedError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this._waiters.push(waiter);
    });
  }

  /** Ejecuta fn dentro de un slot y lo libera al terminar. */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get limit(): number {
    return this._limit;
  }

  get activeCount(): number {
    return this._active;
  }

  get peakActive(): number {
    return this._peakActive;
  }

  get pendingCount(): number {
    return this._waiters.length;
  }

  private _grant(): () => void {
    this._active++;
    this._peakActive = Math.max(this._peakActive, this._active);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this._active--;
      this._next();
    };
  }

  private _next(): void {
    const waiter = this._waiters.shift();
    if (!waiter) return;
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
    waiter.resolve(this._grant());
  }
}
