/**
 * Tests de aceptación: propiedades y escenarios extremo a extremo del gestor de descargas.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { planChunks } from '../../core/engines/ChunkPlanner';
import { DownloadEngine, createDownloadTask } from '../../core/engines/DownloadEngine';
import { BatchScheduler } from '../../core/engines/BatchScheduler';
import { ResumeStore } from '../../core/engines/ResumeStore';
import { FakeTransport } from '../helpers/FakeTransport';
import { FAST_SETTINGS, makeBody, makeTempDir, removeDir, sha256 } from '../helpers/fixtures';

const MiB = 1024 * 1024;

describe('Aceptación: criterios del gestor de descargas', () => {
  describe('A1. El plan es una partición contigua y determinista', () => {
    const cases: Array<[number, number, number]> = [
      [10 * MiB, 4, MiB],
      [10 * MiB + 3, 4, MiB],
      [1, 8, MiB],
      [5 * MiB - 1, 16, MiB],
      [999, 3, 100],
    ];

    it.each(cases)('size=%i workers=%i minChunk=%i cubre [0, size) sin huecos ni solapes', (size, workers, minChunk) => {
      const chunks = planChunks(size, workers, minChunk);
      expect(chunks[0].startOffset).toBe(0);
      for (let i = 1; i < chunks.length; i++) {
        expect(chunks[i].startOffset).toBe(chunks[i - 1].endOffset);
      }
      expect(chunks[chunks.length - 1].endOffset).toBe(size);
      expect(chunks.length).toBeLessThanOrEqual(workers);
      expect(planChunks(size, workers, minChunk)).toEqual(chunks);
    });
  });

  describe('A2. 10 MiB con 4 workers y un corte a 1 MiB en el segundo chunk', () => {
    let dir: string;
    let store: ResumeStore;

    beforeEach(async () => {
      dir = await makeTempDir();
      store = new ResumeStore(path.join(dir, 'resume.db'));
      expect(store.initialize()).toBe(true);
    });

    afterEach(async () => {
      store.close();
      await removeDir(dir);
    });

    it('planifica 4 chunks de 2.5 MiB', () => {
      expect(planChunks(10 * MiB, 4, MiB).map(c => (c.endOffset ?? 0) - c.startOffset)).toEqual([
        2621440, 2621440, 2621440, 2621440,
      ]);
    });

    it('reanuda el chunk en +1 MiB y el archivo final coincide con el origen', async () => {
      const url = 'http://cdn.test/big/archive.iso';
      const body = makeBody(10 * MiB, 42);
      const transport = new FakeTransport()
        .serve(url, { body })
        .disconnect({ url, rangeStart: 2621440, afterBytes: MiB });
      const engine = new DownloadEngine({ store, transport, settings: FAST_SETTINGS });
      const task = createDownloadTask({
        url,
        outputDir: dir,
        workerCount: 4,
        expectedChecksum: { algorithm: 'sha256', digest: sha256(body) },
      });

      const result = await engine.download(task);

      expect(result.status).toBe('success');
      expect(result.checksumVerified).toBe(true);
      expect(result.totalBytes).toBe(10 * MiB);
      expect(transport.rangedGets(url)).toContain('bytes=3670016-5242879');
      expect(transport.rangedGets(url).filter(r => r.startsWith('bytes=2621440-'))).toEqual([
        'bytes=2621440-5242879',
      ]);
      const written = await fs.readFile(path.join(dir, 'archive.iso'));
      expect(written.length).toBe(10 * MiB);
      expect(sha256(written)).toBe(sha256(body));
    });
  });

  describe('A3. Límites de concurrencia', () => {
    let dir: string;
    let store: ResumeStore;

    beforeEach(async () => {
      dir = await makeTempDir();
      store = new ResumeStore(path.join(dir, 'resume.db'));
      expect(store.initialize()).toBe(true);
    });

    afterEach(async () => {
      store.close();
      await removeDir(dir);
    });

    it('una tarea nunca tiene más cuerpos abiertos que worker_count', async () => {
      const url = 'http://cdn.test/data.bin';
      const transport = new FakeTransport().serve(url, { body: makeBody(512 * 1024) });
      const engine = new DownloadEngine({ store, transport, settings: FAST_SETTINGS });

      const result = await engine.download(createDownloadTask({ url, outputDir: dir, workerCount: 3 }));

      expect(result.status).toBe('success');
      expect(transport.peakActiveBodies).toBeLessThanOrEqual(3);
    });

    it('un lote nunca tiene más tareas activas que concurrency_limit', async () => {
      const transport = new FakeTransport();
      const urls = [1, 2, 3, 4].map(n => `http://cdn.test/part-${n}.bin`);
      urls.forEach(url => transport.serve(url, { body: makeBody(128 * 1024) }));
      const engine = new DownloadEngine({ store, transport, settings: FAST_SETTINGS });
      const scheduler = new BatchScheduler(engine);

      const batch = await scheduler.run(
        urls.map(url => createDownloadTask({ url, outputDir: dir })),
        { concurrencyLimit: 3, continueOnError: true }
      );

      expect(batch.summary.succeeded).toBe(4);
      expect(scheduler.peakActive).toBeLessThanOrEqual(3);
      expect(transport.peakActiveBodies).toBeLessThanOrEqual(3);
    });
  });

  describe('A4. Lote con continue-on-error y la tarea 2 de 3 en 404', () => {
    it('devuelve 3 resultados: success, failed, success', async () => {
      const dir = await makeTempDir();
      const store = new ResumeStore(path.join(dir, 'resume.db'));
      store.initialize();
      try {
        const transport = new FakeTransport()
          .serve('http://cdn.test/1.bin', { body: makeBody(4096, 1) })
          .serve('http://cdn.test/3.bin', { body: makeBody(4096, 3) });
        const scheduler = new BatchScheduler(new DownloadEngine({ store, transport, settings: FAST_SETTINGS }));

        const batch = await scheduler.run(
          ['http://cdn.test/1.bin', 'http://cdn.test/2.bin', 'http://cdn.test/3.bin'].map(url =>
            createDownloadTask({ url, outputDir: dir })
          ),
          { concurrencyLimit: 3, continueOnError: true }
        );

        expect(batch.results).toHaveLength(3);
        expect(batch.results.map(r => r.status)).toEqual(['success', 'failed', 'success']);
        expect(batch.results[1].error?.kind).toBe('http_client');
      } finally {
        store.close();
        await removeDir(dir);
      }
    });
  });
});
