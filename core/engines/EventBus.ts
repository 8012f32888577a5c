/**
 * Bus de eventos de una ejecución del motor.
 *
 * Emite: taskStarted, chunkCompleted, chunkFailed, downgraded, verificationStarted,
 * taskCompleted, taskFailed. Cada DownloadEngine posee su instancia; no hay estado global.
 *
 * @module EventBus
 */

import EventEmitter from 'events';
import type { TaskResult } from '../../shared/types';

export interface TaskStartedEvent {
  taskId: string;
  url: string;
  destinationPath: string;
  expectedSize: number | null;
  chunkCount: number;
  resumed: boolean;
  timestamp: number;
}

export interface ChunkCompletedEvent {
  taskId: string;
  chunkIndex: number;
  timestamp: number;
}

export interface ChunkFailedEvent {
  taskId: string;
  chunkIndex: number;
  error: string;
  willRetry: boolean;
  timestamp: number;
}

export interface DowngradedEvent {
  taskId: string;
  reason: string;
  timestamp: number;
}

export interface VerificationStartedEvent {
  taskId: string;
  timestamp: number;
}

export interface DownloadEventMap {
  taskStarted: TaskStartedEvent;
  chunkCompleted: ChunkCompletedEvent;
  chunkFailed: ChunkFailedEvent;
  downgraded: DowngradedEvent;
  verificationStarted: VerificationStartedEvent;
  taskCompleted: TaskResult;
  taskFailed: TaskResult;
}

export type DownloadEventName = keyof DownloadEventMap;

class EventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  /** Suscripción tipada. Devuelve la función para desuscribirse. */
  subscribe<K extends DownloadEventName>(
    event: K,
    listener: (_payload: DownloadEventMap[K]) => void
  ): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  emitTaskStarted(payload: Omit<TaskStartedEvent, 'timestamp'>): void {
    this.emit('taskStarted', { ...payload, timestamp: Date.now() });
  }

  emitChunkCompleted(taskId: string, chunkIndex: number): void {
    this.emit('chunkCompleted', { taskId, chunkIndex, timestamp: Date.now() });
  }

  emitChunkFailed(taskId: string, chunkIndex: number, errorMessage: string, willRetry: boolean): void {
    this.emit('chunkFailed', {
      taskId,
      chunkIndex,
      error: errorMessage,
      willRetry,
      timestamp: Date.now(),
    });
  }

  emitDowngraded(taskId: string, reason: string): void {
    this.emit('downgraded', { taskId, reason, timestamp: Date.now() });
  }

  emitVerificationStarted(taskId: string): void {
    this.emit('verificationStarted', { taskId, timestamp: Date.now() });
  }

  emitTaskFinished(result: TaskResult): void {
    this.emit(result.status === 'success' ? 'taskCompleted' : 'taskFailed', result);
  }

  clear(): void {
    this.removeAllListeners();
  }
}

export default EventBus;
export { EventBus };
