/**
 * Tests unitarios para core/engines/EventBus.ts
 */
import { EventBus } from '../../core/engines/EventBus';
import type { ChunkFailedEvent, DowngradedEvent } from '../../core/engines/EventBus';
import type { TaskResult } from '../../shared/types';

function result(status: TaskResult['status']): TaskResult {
  return {
    taskId: 't1',
    url: 'https://files.test/a.bin',
    status,
    destinationPath: null,
    bytesTransferred: 0,
    totalBytes: 0,
    durationMs: 0,
    chunkCount: 0,
    resumed: false,
  };
}

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  afterEach(() => {
    bus.clear();
  });

  it('entrega eventos tipados con timestamp', () => {
    const seen: ChunkFailedEvent[] = [];
    bus.subscribe('chunkFailed', e => seen.push(e));
    bus.emitChunkFailed('t1', 2, 'HTTP 503', true);
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ taskId: 't1', chunkIndex: 2, error: 'HTTP 503', willRetry: true });
    expect(typeof seen[0].timestamp).toBe('number');
  });

  it('subscribe devuelve la función para desuscribirse', () => {
    const seen: DowngradedEvent[] = [];
    const unsubscribe = bus.subscribe('downgraded', e => seen.push(e));
    bus.emitDowngraded('t1', 'motivo');
    unsubscribe();
    bus.emitDowngraded('t1', 'otro');
    expect(seen.map(e => e.reason)).toEqual(['motivo']);
  });

  it('emitTaskFinished distingue éxito del resto', () => {
    const completed = jest.fn();
    const failed = jest.fn();
    bus.subscribe('taskCompleted', completed);
    bus.subscribe('taskFailed', failed);
    bus.emitTaskFinished(result('success'));
    bus.emitTaskFinished(result('failed'));
    bus.emitTaskFinished(result('aborted'));
    expect(completed).toHaveBeenCalledTimes(1);
    expect(failed).toHaveBeenCalledTimes(2);
  });
});
