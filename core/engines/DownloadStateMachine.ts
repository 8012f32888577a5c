/**
 * Máquinas de estados explícitas para tareas y chunks.
 *
 * Cualquier transición no listada es inválida; el motor y los workers consultan
 * canTransition / assertTransition antes de mutar el estado.
 *
 * @module DownloadStateMachine
 */

import { TaskState, ChunkState } from './types';
import type { TaskStateType, ChunkStateType, DownloadTask, Chunk } from './types';

/**
 * Transiciones de tarea permitidas: desde cada estado, lista de estados destino válidos.
 * planning → planning cubre el re-sondeo tras 416 o el paso a single-stream.
 */
const TASK_TRANSITIONS: Readonly<Record<TaskStateType, readonly TaskStateType[]>> = {
  [TaskState.PENDING]: [TaskState.PLANNING, TaskState.ABORTED],
  [TaskState.PLANNING]: [
    TaskState.PLANNING,
    TaskState.TRANSFERRING,
    TaskState.FAILED,
    TaskState.ABORTED,
  ],
  [TaskState.TRANSFERRING]: [
    TaskState.PLANNING,
    TaskState.VERIFYING,
    TaskState.FAILED,
    TaskState.ABORTED,
  ],
  [TaskState.VERIFYING]: [TaskState.DONE, TaskState.FAILED, TaskState.ABORTED],
  [TaskState.DONE]: [],
  [TaskState.FAILED]: [],
  [TaskState.ABORTED]: [],
};

const CHUNK_TRANSITIONS: Readonly<Record<ChunkStateType, readonly ChunkStateType[]>> = {
  [ChunkState.PENDING]: [ChunkState.CONNECTING, ChunkState.COMPLETE, ChunkState.FAILED],
  [ChunkState.CONNECTING]: [ChunkState.STREAMING, ChunkState.FAILED, ChunkState.PENDING],
  [ChunkState.STREAMING]: [ChunkState.COMPLETE, ChunkState.FAILED, ChunkState.PENDING],
  [ChunkState.COMPLETE]: [],
  [ChunkState.FAILED]: [ChunkState.PENDING],
};

export function canTransition(from: TaskStateType, to: TaskStateType): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function canTransitionChunk(from: ChunkStateType, to: ChunkStateType): boolean {
  return CHUNK_TRANSITIONS[from].includes(to);
}

/** Aplica la transición a la tarea o lanza si no está permitida. */
export function transitionTask(task: DownloadTask, to: TaskStateType): void {
  if (!canTransition(task.state, to)) {
    throw new Error(`Transición de tarea inválida: ${task.state} → ${to}`);
  }
  task.state = to;
}

/** Aplica la transición al chunk o lanza si no está permitida. */
export function transitionChunk(chunk: Chunk, to: ChunkStateType): void {
  if (!canTransitionChunk(chunk.status, to)) {
    throw new Error(`Transición de chunk ${chunk.id} inválida: ${chunk.status} → ${to}`);
  }
  chunk.status = to;
}

export const TERMINAL_TASK_STATES: readonly TaskStateType[] = [
  TaskState.DONE,
  TaskState.FAILED,
  TaskState.ABORTED,
];

export function isTerminalState(state: TaskStateType): boolean {
  return TERMINAL_TASK_STATES.includes(state);
}

/** Estados de chunk con conexión en curso. */
export function isActiveChunkState(state: ChunkStateType): boolean {
  return state === ChunkState.CONNECTING || state === ChunkState.STREAMING;
}
