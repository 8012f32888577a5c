/**
 * Tests unitarios para core/cli/renderer.ts
 */
import {
  TerminalRenderer,
  formatBatchJson,
  formatBatchTable,
  formatProgressLine,
  formatTaskError,
  formatTaskSummary,
} from '../../core/cli/renderer';
import type { OutputStream } from '../../core/cli/renderer';
import { EventBus } from '../../core/engines/EventBus';
import type { BatchResult, ProgressSnapshot, TaskResult } from '../../shared/types';

const MiB = 1024 * 1024;

class MemoryStream implements OutputStream {
  readonly chunks: string[] = [];
  constructor(readonly isTTY = false) {}
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
  get text(): string {
    return this.chunks.join('');
  }
}

function snapshot(overrides: Partial<ProgressSnapshot> = {}): ProgressSnapshot {
  return {
    taskId: 't1',
    url: 'https://f.test/a.bin',
    completedBytes: 5 * MiB,
    sessionBytes: 5 * MiB,
    expectedSize: 10 * MiB,
    speedBytesPerSec: 1.5 * MiB,
    remainingTime: 5,
    activeChunks: 1,
    chunks: [],
    timestamp: 0,
    ...overrides,
  };
}

function taskResult(overrides: Partial<TaskResult> = {}): TaskResult {
  return {
    taskId: 't1',
    url: 'https://f.test/a.bin',
    destinationPath: '/tmp/a.bin',
    status: 'success',
    bytesTransferred: 2048,
    totalBytes: 2048,
    durationMs: 3000,
    resumed: false,
    chunkCount: 1,
    ...overrides,
  };
}

const FAILED_404 = taskResult({
  url: 'https://f.test/b.bin',
  status: 'failed',
  destinationPath: null,
  totalBytes: 0,
  error: { kind: 'http_client', message: 'HTTP 404', code: 'HTTP_404', statusCode: 404 },
});

function batch(): BatchResult {
  return {
    status: 'completed',
    results: [taskResult(), FAILED_404],
    summary: { total: 2, succeeded: 1, failed: 1, aborted: 0, totalBytes: 2048, durationMs: 2000 },
  };
}

describe('renderer', () => {
  describe('formatProgressLine', () => {
    it('muestra porcentaje, tamaños, velocidad y ETA', () => {
      expect(formatProgressLine(snapshot())).toBe('[ 50.0%] 5 MB / 10 MB  1.5 MB/s  ETA 5s');
    });

    it('sin ETA estimable muestra --', () => {
      expect(formatProgressLine(snapshot({ remainingTime: null }))).toBe('[ 50.0%] 5 MB / 10 MB  1.5 MB/s  ETA --');
    });

    it('sin tamaño conocido omite porcentaje y ETA', () => {
      expect(formatProgressLine(snapshot({ expectedSize: null, completedBytes: 2048, speedBytesPerSec: 0 }))).toBe(
        '2 KB  0 Bytes/s'
      );
    });
  });

  describe('formatTaskError', () => {
    it('no repite el status si ya está en el mensaje', () => {
      expect(formatTaskError(FAILED_404)).toBe('HTTP 404 [http_client]');
    });

    it('añade el status HTTP cuando el mensaje no lo incluye', () => {
      const result = taskResult({
        status: 'failed',
        error: { kind: 'http_client', message: 'Rango no satisfacible', statusCode: 416 },
      });
      expect(formatTaskError(result)).toBe('Rango no satisfacible (HTTP 416) [http_client]');
    });

    it('distingue una tarea no iniciada de una cancelada', () => {
      expect(formatTaskError(taskResult({ status: 'aborted', chunkCount: 0, durationMs: 0 }))).toBe('no iniciada');
      expect(formatTaskError(taskResult({ status: 'aborted', chunkCount: 2, durationMs: 150 }))).toBe(
        'Cancelado por el usuario'
      );
    });
  });

  describe('formatTaskSummary', () => {
    it('resume una descarga correcta con checksum', () => {
      expect(formatTaskSummary(taskResult({ checksumVerified: true }))).toBe(
        '✓ Descarga completada: /tmp/a.bin (2 KB en 3s, checksum verificado)'
      );
    });

    it('resume una descarga fallida con su URL', () => {
      expect(formatTaskSummary(FAILED_404)).toBe('✗ https://f.test/b.bin: HTTP 404 [http_client]');
    });
  });

  describe('formatBatchTable', () => {
    it('incluye totales y las URLs fallidas', () => {
      expect(formatBatchTable(batch()).split('\n')).toEqual([
        '',
        'Lote completado',
        '  Total:            2',
        '  Correctas:        1',
        '  Fallidas:         1',
        '  Canceladas:       0',
        '  Tamaño total:     2 KB',
        '  Tiempo total:     2s',
        '  Velocidad media:  1 KB/s',
        '',
        'URLs fallidas:',
        '  - https://f.test/b.bin: HTTP 404 [http_client]',
      ]);
    });
  });

  describe('formatBatchJson', () => {
    it('usa claves estables', () => {
      expect(JSON.parse(formatBatchJson(batch()))).toEqual({
        status: 'completed',
        total_urls: 2,
        successful: 1,
        failed: 1,
        aborted: 0,
        total_bytes: 2048,
        duration_ms: 2000,
        results: [
          {
            url: 'https://f.test/a.bin',
            status: 'success',
            destination: '/tmp/a.bin',
            bytes: 2048,
            duration_ms: 3000,
            resumed: false,
          },
          {
            url: 'https://f.test/b.bin',
            status: 'failed',
            destination: null,
            bytes: 0,
            duration_ms: 3000,
            resumed: false,
            error: { kind: 'http_client', message: 'HTTP 404', code: 'HTTP_404' },
          },
        ],
      });
    });
  });

  describe('TerminalRenderer', () => {
    it('solo dibuja progreso en terminales interactivas', () => {
      const plain = new MemoryStream(false);
      new TerminalRenderer({ quiet: false, stdout: plain }).progress(snapshot());
      expect(plain.chunks).toEqual([]);

      const tty = new MemoryStream(true);
      const renderer = new TerminalRenderer({ quiet: false, stdout: tty });
      renderer.progress(snapshot(), '[1/3]');
      renderer.info('hecho');
      expect(tty.chunks).toEqual([
        '\r\x1b[2K[1/3] [ 50.0%] 5 MB / 10 MB  1.5 MB/s  ETA 5s',
        '\n',
        'hecho\n',
      ]);
    });

    it('en modo silencioso solo escribe errores', () => {
      const stdout = new MemoryStream(true);
      const stderr = new MemoryStream();
      const renderer = new TerminalRenderer({ quiet: true, stdout, stderr });
      renderer.progress(snapshot());
      renderer.taskResult(taskResult());
      renderer.taskResult(FAILED_404);
      expect(stdout.text).toBe('');
      expect(stderr.text).toBe('✗ https://f.test/b.bin: HTTP 404 [http_client]\n');
    });

    it('traduce eventos del motor hasta desuscribirse', () => {
      const stdout = new MemoryStream();
      const events = new EventBus();
      const detach = new TerminalRenderer({ quiet: false, stdout }).attach(events);

      events.emitTaskStarted({
        taskId: 't1',
        url: 'https://f.test/a.bin',
        destinationPath: '/tmp/a.bin',
        expectedSize: 100,
        chunkCount: 4,
        resumed: false,
      });
      events.emitChunkFailed('t1', 1, 'HTTP 503', true);
      events.emitChunkFailed('t1', 2, 'HTTP 404', false);
      events.emitDowngraded('t1', 'tamaño desconocido');
      events.emitVerificationStarted('t1');
      detach();
      events.emitVerificationStarted('t1');

      expect(stdout.text.split('\n')).toEqual([
        'Descargando /tmp/a.bin (4 partes)',
        'Parte 2: HTTP 503; reintentando',
        'Descarga en un solo flujo: tamaño desconocido',
        'Verificando integridad...',
        '',
      ]);
    });

    it('el informe JSON se imprime también en modo silencioso', () => {
      const stdout = new MemoryStream();
      new TerminalRenderer({ quiet: true, stdout }).batchReport(batch(), 'json');
      expect(JSON.parse(stdout.text).total_urls).toBe(2);
    });

    it('en modo silencioso la tabla se reduce a los conteos', () => {
      const stdout = new MemoryStream();
      new TerminalRenderer({ quiet: true, stdout }).batchReport(batch(), 'table');
      expect(stdout.text).toBe('1 correcta(s), 1 fallida(s), 0 cancelada(s)\n');
    });
  });
});
