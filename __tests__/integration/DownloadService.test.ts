/**
 * Tests de integración de DownloadService: validación de parámetros, archivo de URLs
 * y descargas reales contra el transporte en proceso.
 */
import { promises as fs } from 'fs';
import path from 'path';
import DownloadService, { exitCodeFor, parseUrlList, requestSettings } from '../../core/services/DownloadService';
import { ResumeStore } from '../../core/engines/ResumeStore';
import type { TaskResult } from '../../shared/types';
import { FakeTransport } from '../helpers/FakeTransport';
import { FAST_SETTINGS, makeBody, makeTempDir, removeDir, sha256 } from '../helpers/fixtures';

const FILE_URL = 'http://files.test/pub/data.bin';
const MISSING_URL = 'http://files.test/pub/missing.bin';
const SIZE = 128 * 1024;

function result(status: TaskResult['status']): TaskResult {
  return {
    taskId: 't',
    url: FILE_URL,
    destinationPath: null,
    status,
    bytesTransferred: 0,
    totalBytes: 0,
    durationMs: 0,
    resumed: false,
    chunkCount: 0,
  };
}

describe('DownloadService', () => {
  describe('exitCodeFor', () => {
    it('devuelve 0 si todas las tareas terminaron bien', () => {
      expect(exitCodeFor([])).toBe(0);
      expect(exitCodeFor([result('success'), result('success')])).toBe(0);
    });

    it('cuenta fallidas y canceladas con tope 125', () => {
      expect(exitCodeFor([result('success'), result('failed'), result('aborted')])).toBe(2);
      expect(exitCodeFor(Array.from({ length: 200 }, () => result('failed')))).toBe(125);
    });
  });

  describe('parseUrlList', () => {
    it('ignora líneas vacías y comentarios', () => {
      expect(parseUrlList('https://a.test/1\n\n  # comentario\r\n  https://a.test/2  \n')).toEqual([
        'https://a.test/1',
        'https://a.test/2',
      ]);
    });
  });

  describe('requestSettings', () => {
    it('convierte segundos a milisegundos y reintentos a intentos', () => {
      expect(requestSettings({ timeout: 1.5, retries: 2, userAgent: 'agente-test' })).toEqual({
        connectTimeout: 1500,
        idleTimeout: 1500,
        maxAttempts: 3,
        userAgent: 'agente-test',
      });
      expect(requestSettings({})).toEqual({});
    });
  });

  describe('operaciones', () => {
    let dir: string;
    let outDir: string;
    let store: ResumeStore;
    let transport: FakeTransport;
    let service: DownloadService;
    let body: Buffer;

    beforeEach(async () => {
      dir = await makeTempDir();
      outDir = path.join(dir, 'out');
      await fs.mkdir(outDir);
      store = new ResumeStore(path.join(dir, 'state', 'resume.db'));
      transport = new FakeTransport();
      service = new DownloadService({ store, transport, settings: FAST_SETTINGS });
      await service.initialize();
      body = makeBody(SIZE);
      transport.serve(FILE_URL, { body });
    });

    afterEach(async () => {
      await service.destroy();
      await removeDir(dir);
    });

    it('rechaza parámetros inválidos sin tocar la red', async () => {
      const response = await service.downloadSingle({ url: 'ftp://files.test/a.bin' });
      expect(response).toEqual({
        success: false,
        error: 'url: Solo se admiten URLs http:// y https://',
        code: 'INVALID_INPUT',
        context: 'downloadSingle',
      });
      expect(transport.requests).toHaveLength(0);
    });

    it('descarga simple con checksum verificado', async () => {
      const started: number[] = [];
      const finished: string[] = [];
      const response = await service.downloadSingle(
        { url: FILE_URL, output: outDir, checksum: `sha256:${sha256(body)}` },
        {
          onTaskStart: (_task, index) => started.push(index),
          onTaskResult: taskResult => finished.push(taskResult.status),
        }
      );

      expect(response.success).toBe(true);
      expect(response.data?.exitCode).toBe(0);
      expect(response.data?.quiet).toBe(false);
      expect(response.data?.result).toMatchObject({
        status: 'success',
        destinationPath: path.join(outDir, 'data.bin'),
        chunkCount: 1,
        checksumVerified: true,
      });
      expect(started).toEqual([0]);
      expect(finished).toEqual(['success']);
      expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
    });

    it('la descarga acelerada divide en el número de partes pedido', async () => {
      const response = await service.downloadAccelerated({
        url: FILE_URL,
        output: path.join(outDir, 'copia.bin'),
        parts: '4',
      });

      expect(response.data?.result.status).toBe('success');
      expect(response.data?.result.chunkCount).toBe(4);
      expect(transport.rangedGets(FILE_URL)).toHaveLength(4);
      expect(await fs.readFile(path.join(outDir, 'copia.bin'))).toEqual(body);
    });

    it('una descarga fallida se refleja en el código de salida', async () => {
      const response = await service.downloadSingle({ url: MISSING_URL, output: outDir });

      expect(response.success).toBe(true);
      expect(response.data?.result.status).toBe('failed');
      expect(response.data?.result.error?.statusCode).toBe(404);
      expect(response.data?.exitCode).toBe(1);
    });

    describe('downloadBatchFromFile', () => {
      it('informa de un archivo de URLs inexistente', async () => {
        const response = await service.downloadBatchFromFile(path.join(dir, 'no-existe.txt'), {});
        expect(response.success).toBe(false);
        expect(response.code).toBe('URLS_FILE_READ_FAILED');
        expect(response.error?.startsWith('Error leyendo el archivo de URLs: ')).toBe(true);
      });

      it('rechaza un archivo sin URLs', async () => {
        const file = path.join(dir, 'urls.txt');
        await fs.writeFile(file, '# nada que descargar\n\n');
        const response = await service.downloadBatchFromFile(file, {});
        expect(response).toEqual({
          success: false,
          error: `No se encontraron URLs en el archivo: ${file}`,
          code: 'URLS_FILE_EMPTY',
          context: 'downloadBatchFromFile',
        });
      });

      it('descarga el lote y cuenta las tareas no exitosas', async () => {
        const file = path.join(dir, 'urls.txt');
        await fs.writeFile(file, `${FILE_URL}\n# comentario\n${MISSING_URL}\n`);
        const response = await service.downloadBatchFromFile(file, {
          outputDir: outDir,
          continueOnError: true,
          format: 'json',
        });

        expect(response.success).toBe(true);
        expect(response.data?.format).toBe('json');
        expect(response.data?.exitCode).toBe(1);
        expect(response.data?.result.results.map(r => r.status)).toEqual(['success', 'failed']);
        expect(response.data?.result.summary).toMatchObject({ total: 2, succeeded: 1, failed: 1, aborted: 0 });
        expect(await fs.readFile(path.join(outDir, 'data.bin'))).toEqual(body);
      });
    });
  });
});
