/**
 * Tests de integración del motor de descargas.
 *
 * Componentes reales (RangeResolver, ChunkPlanner, WorkerPool, ResumeStore con SQLite
 * en un directorio temporal, Verifier) contra un transporte HTTP en proceso.
 */
import { promises as fs } from 'fs';
import path from 'path';
import { DownloadEngine, createDownloadTask } from '../../core/engines/DownloadEngine';
import { ResumeStore } from '../../core/engines/ResumeStore';
import { ERRORS } from '../../core/constants/errors';
import { pathExists } from '../../core/utils/fileHelpers';
import type { ChunkFailedEvent, DowngradedEvent } from '../../core/engines/EventBus';
import { FakeTransport } from '../helpers/FakeTransport';
import { FAST_SETTINGS, makeBody, makeTempDir, removeDir, sha256 } from '../helpers/fixtures';

const URL = 'http://files.test/pub/data.bin';
const SIZE = 256 * 1024;

describe('DownloadEngine Integration Flow', () => {
  let dir: string;
  let outDir: string;
  let store: ResumeStore;
  let transport: FakeTransport;
  let engine: DownloadEngine;
  let body: Buffer;

  beforeEach(async () => {
    dir = await makeTempDir();
    outDir = path.join(dir, 'out');
    store = new ResumeStore(path.join(dir, 'state', 'resume.db'));
    expect(store.initialize()).toBe(true);
    transport = new FakeTransport();
    engine = new DownloadEngine({ store, transport, settings: FAST_SETTINGS });
    body = makeBody(SIZE);
  });

  afterEach(async () => {
    store.close();
    await removeDir(dir);
  });

  describe('transferencia', () => {
    it('descarga en 4 partes con Range y produce un archivo idéntico', async () => {
      transport.serve(URL, { body });
      const task = createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 });

      const result = await engine.download(task);

      expect(result.status).toBe('success');
      expect(result.destinationPath).toBe(path.join(outDir, 'data.bin'));
      expect(result.chunkCount).toBe(4);
      expect(result.totalBytes).toBe(SIZE);
      expect(result.bytesTransferred).toBe(SIZE);
      expect(result.resumed).toBe(false);
      expect(result.error).toBeUndefined();
      expect(task.state).toBe('done');
      expect(transport.rangedGets(URL).sort()).toEqual(
        ['bytes=0-65535', 'bytes=65536-131071', 'bytes=131072-196607', 'bytes=196608-262143'].sort()
      );
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
      expect(store.hasRecord(URL, path.join(outDir, 'data.bin'))).toBe(false);
    });

    it('usa single-stream sin Range cuando el servidor no lo soporta', async () => {
      transport.serve(URL, { body, acceptRanges: false });
      const downgrades: DowngradedEvent[] = [];
      engine.events.subscribe('downgraded', e => downgrades.push(e));

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));

      expect(result.status).toBe('success');
      expect(result.chunkCount).toBe(1);
      expect(transport.rangedGets(URL)).toEqual([]);
      expect(downgrades).toHaveLength(1);
      expect(downgrades[0].reason).toBe('El servidor no acepta peticiones Range');
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });

    it('pasa a single-stream si el servidor responde 200 a una petición con Range', async () => {
      transport.serve(URL, { body, ignoreRange: true });
      const downgrades: DowngradedEvent[] = [];
      engine.events.subscribe('downgraded', e => downgrades.push(e));

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));

      expect(result.status).toBe('success');
      expect(result.chunkCount).toBe(1);
      expect(result.bytesTransferred).toBe(SIZE);
      expect(downgrades).toHaveLength(1);
      expect(downgrades[0].reason).toBe(ERRORS.DOWNLOAD.RANGE_IGNORED);
      const lastGet = transport.requests.filter(r => r.method === 'GET').pop();
      expect(lastGet?.range).toBeNull();
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });

    it('reintenta un 503 y termina bien', async () => {
      transport.serve(URL, { body }).respondWith({ url: URL, status: 503, method: 'GET', times: 1 });
      const failures: ChunkFailedEvent[] = [];
      engine.events.subscribe('chunkFailed', e => failures.push(e));

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir }));

      expect(result.status).toBe('success');
      expect(failures).toHaveLength(1);
      expect(failures[0].willRetry).toBe(true);
      expect(failures[0].error).toBe('HTTP 503');
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });

    it('reintenta una parte que deja de recibir datos desde el último byte escrito', async () => {
      transport.serve(URL, { body }).stall({ url: URL, rangeStart: 65536, afterBytes: 16384 });
      const failures: ChunkFailedEvent[] = [];
      const idleEngine = new DownloadEngine({ store, transport, settings: { ...FAST_SETTINGS, idleTimeout: 100 } });
      idleEngine.events.subscribe('chunkFailed', e => failures.push(e));

      const result = await idleEngine.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));

      expect(result.status).toBe('success');
      expect(failures).toEqual([
        expect.objectContaining({ chunkIndex: 1, error: 'Sin datos del servidor durante demasiado tiempo', willRetry: true }),
      ]);
      expect(transport.rangedGets(URL)).toContain('bytes=81920-131071');
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });

    it('descarga con tamaño desconocido hasta el final del stream', async () => {
      transport.serve(URL, { body, acceptRanges: false, omitLength: true });

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));

      expect(result.status).toBe('success');
      expect(result.totalBytes).toBe(SIZE);
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });

    it('crea un archivo vacío sin GET para un recurso de 0 bytes', async () => {
      transport.serve(URL, { body: Buffer.alloc(0) });

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));

      expect(result.status).toBe('success');
      expect(result.totalBytes).toBe(0);
      expect(result.chunkCount).toBe(0);
      expect(transport.requests.filter(r => r.method === 'GET')).toHaveLength(0);
      expect((await fs.stat(path.join(outDir, 'data.bin'))).size).toBe(0);
    });
  });

  describe('nombres de destino', () => {
    it('añade un sufijo numérico si el destino ya existe', async () => {
      transport.serve(URL, { body });
      await fs.mkdir(outDir, { recursive: true });
      await fs.writeFile(path.join(outDir, 'data.bin'), 'previo');

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir }));

      expect(result.destinationPath).toBe(path.join(outDir, 'data (1).bin'));
      expect(await fs.readFile(path.join(outDir, 'data.bin'), 'utf8')).toBe('previo');
    });

    it('sobrescribe el destino con overwrite', async () => {
      transport.serve(URL, { body });
      await fs.mkdir(outDir, { recursive: true });
      await fs.writeFile(path.join(outDir, 'data.bin'), 'previo');

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir, overwrite: true }));

      expect(result.destinationPath).toBe(path.join(outDir, 'data.bin'));
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });

    it('usa el nombre de Content-Disposition', async () => {
      transport.serve(URL, { body, contentDisposition: "attachment; filename*=UTF-8''informe%20final.pdf" });

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir }));

      expect(result.destinationPath).toBe(path.join(outDir, 'informe final.pdf'));
    });
  });

  describe('reanudación', () => {
    it('reanuda tras un corte y transfiere solo los bytes que faltaban', async () => {
      transport.serve(URL, { body }).disconnect({ url: URL, rangeStart: 65536, afterBytes: 32768 });
      const dest = path.join(outDir, 'data.bin');
      const failing = new DownloadEngine({ store, transport, settings: { ...FAST_SETTINGS, maxAttempts: 1 } });

      const first = await failing.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));

      expect(first.status).toBe('failed');
      expect(first.error?.kind).toBe('network');
      expect(first.error?.code).toBe('ECONNRESET');
      const record = store.load(URL, dest);
      expect(record).not.toBeNull();
      expect(record?.chunks[1].bytesWritten).toBe(32768);
      const alreadyWritten = record?.chunks.reduce((sum, c) => sum + c.bytesWritten, 0) ?? 0;
      const requestsBefore = transport.requests.length;

      const second = await engine.download(
        createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4, resume: true })
      );

      expect(second.status).toBe('success');
      expect(second.resumed).toBe(true);
      expect(second.destinationPath).toBe(dest);
      expect(second.bytesTransferred).toBe(SIZE - alreadyWritten);
      const resumedRanges = transport.requests
        .slice(requestsBefore)
        .filter(r => r.method === 'GET')
        .map(r => r.range);
      expect(resumedRanges).toContain('bytes=98304-131071');
      expect(await fs.readFile(dest)).toEqual(body);
      expect(store.hasRecord(URL, dest)).toBe(false);
    });

    it('reinicia desde cero si el registro no coincide con el plan actual', async () => {
      transport.serve(URL, { body }).disconnect({ url: URL, rangeStart: 0, afterBytes: 16384 });
      const dest = path.join(outDir, 'data.bin');
      const failing = new DownloadEngine({ store, transport, settings: { ...FAST_SETTINGS, maxAttempts: 1 } });
      await failing.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));
      expect(store.hasRecord(URL, dest)).toBe(true);

      const second = await engine.download(
        createDownloadTask({ url: URL, outputDir: outDir, workerCount: 2, resume: true })
      );

      expect(second.status).toBe('success');
      expect(second.resumed).toBe(false);
      expect(second.destinationPath).toBe(dest);
      expect(second.bytesTransferred).toBe(SIZE);
      expect(await fs.readFile(dest)).toEqual(body);
    });

    it('conserva el registro al cancelar', async () => {
      transport.serve(URL, { body });
      const controller = new AbortController();
      engine.events.subscribe('taskStarted', () => controller.abort());
      const task = createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 });

      const result = await engine.download(task, { signal: controller.signal });

      expect(result.status).toBe('aborted');
      expect(result.error).toBeUndefined();
      expect(task.state).toBe('aborted');
      expect(store.hasRecord(URL, path.join(outDir, 'data.bin'))).toBe(true);
    });

    it('descarta el registro y vuelve a sondear tras un 416', async () => {
      transport.serve(URL, { body }).respondWith({
        url: URL,
        status: 416,
        method: 'GET',
        onlyRanged: true,
        headers: { 'content-range': `bytes */${SIZE}` },
        times: 1,
      });

      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir, workerCount: 4 }));

      expect(result.status).toBe('success');
      expect(transport.requests.filter(r => r.method === 'HEAD')).toHaveLength(2);
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });
  });

  describe('verificación', () => {
    it('verifica un checksum correcto en multi-part', async () => {
      transport.serve(URL, { body });
      const task = createDownloadTask({
        url: URL,
        outputDir: outDir,
        workerCount: 4,
        expectedChecksum: { algorithm: 'sha256', digest: sha256(body) },
      });

      const result = await engine.download(task);

      expect(result.status).toBe('success');
      expect(result.checksumVerified).toBe(true);
    });

    it('falla con checksum_mismatch y conserva el archivo', async () => {
      transport.serve(URL, { body });
      const dest = path.join(outDir, 'data.bin');
      const task = createDownloadTask({
        url: URL,
        outputDir: outDir,
        expectedChecksum: { algorithm: 'sha256', digest: sha256(makeBody(SIZE, 99)) },
      });

      const result = await engine.download(task);

      expect(result.status).toBe('failed');
      expect(result.error?.kind).toBe('checksum_mismatch');
      expect(result.checksumVerified).toBe(false);
      expect(await pathExists(dest)).toBe(true);
      expect(store.hasRecord(URL, dest)).toBe(false);
    });

    it('borra el archivo con deleteOnMismatch', async () => {
      transport.serve(URL, { body });
      const task = createDownloadTask({
        url: URL,
        outputDir: outDir,
        deleteOnMismatch: true,
        expectedChecksum: { algorithm: 'md5', digest: '0'.repeat(32) },
      });

      const result = await engine.download(task);

      expect(result.error?.kind).toBe('checksum_mismatch');
      expect(await pathExists(path.join(outDir, 'data.bin'))).toBe(false);
    });
  });

  describe('errores', () => {
    it('falla por límite de tamaño sin escribir ningún byte', async () => {
      transport.serve(URL, { body });

      const result = await engine.download(
        createDownloadTask({ url: URL, outputDir: outDir, maxBytes: 1000 })
      );

      expect(result.status).toBe('failed');
      expect(result.error?.kind).toBe('size_limit_exceeded');
      expect(result.destinationPath).toBeNull();
      expect(await pathExists(outDir)).toBe(false);
      expect(transport.requests.every(r => r.method === 'HEAD')).toBe(true);
    });

    it('corta y borra el archivo si un cuerpo sin tamaño supera el límite', async () => {
      transport.serve(URL, { body, acceptRanges: false, omitLength: true });

      const result = await engine.download(
        createDownloadTask({ url: URL, outputDir: outDir, maxBytes: 100000 })
      );

      expect(result.status).toBe('failed');
      expect(result.error?.kind).toBe('size_limit_exceeded');
      expect(await pathExists(path.join(outDir, 'data.bin'))).toBe(false);
      expect(store.hasRecord(URL, path.join(outDir, 'data.bin'))).toBe(false);
    });

    it('falla con http_client ante un 404', async () => {
      const result = await engine.download(createDownloadTask({ url: URL, outputDir: outDir }));

      expect(result.status).toBe('failed');
      expect(result.error).toEqual({
        kind: 'http_client',
        message: 'HTTP 404',
        code: 'HTTP_404',
        statusCode: 404,
      });
      expect(result.destinationPath).toBeNull();
    });
  });
});
