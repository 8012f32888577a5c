/**
 * Tests unitarios para core/engines/ResumeStore.ts
 *
 * Cada test usa una base SQLite propia en un directorio temporal.
 */
import Database from 'better-sqlite3';
import path from 'path';
import { planChunks } from '../../core/engines/ChunkPlanner';
import { ResumeStore } from '../../core/engines/ResumeStore';
import type { NewResumeRecord } from '../../core/engines/ResumeStore';
import { makeTempDir, removeDir } from '../helpers/fixtures';

const RECORD_URL = 'https://files.test/big.iso';

describe('ResumeStore', () => {
  let dir: string;
  let dbPath: string;
  let store: ResumeStore;
  let destination: string;

  function newRecord(overrides: Partial<NewResumeRecord> = {}): NewResumeRecord {
    return {
      url: RECORD_URL,
      destinationPath: destination,
      expectedSize: 4000,
      supportsRange: true,
      checksumAlgorithm: 'sha256',
      workerCount: 4,
      chunks: planChunks(4000, 4, 100),
      ...overrides,
    };
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    dbPath = path.join(dir, 'state', 'resume.db');
    destination = path.join(dir, 'big.iso');
    store = new ResumeStore(dbPath);
    expect(store.initialize()).toBe(true);
  });

  afterEach(async () => {
    store.close();
    await removeDir(dir);
  });

  describe('initialize', () => {
    it('es idempotente', () => {
      expect(store.initialize()).toBe(true);
      expect(store.isInitialized).toBe(true);
    });

    it('devuelve false si la base no se puede abrir', () => {
      const broken = new ResumeStore(dir);
      expect(broken.initialize()).toBe(false);
      expect(broken.isInitialized).toBe(false);
    });
  });

  describe('recordId', () => {
    it('es estable y depende de URL y destino', () => {
      const id = ResumeStore.recordId(RECORD_URL, destination);
      expect(ResumeStore.recordId(RECORD_URL, destination)).toBe(id);
      expect(ResumeStore.recordId(RECORD_URL, destination + '.2')).not.toBe(id);
      expect(ResumeStore.recordId(RECORD_URL + '?v=2', destination)).not.toBe(id);
    });
  });

  describe('create / load', () => {
    it('persiste el registro y sus chunks', () => {
      const created = store.create(newRecord());
      const loaded = store.load(RECORD_URL, destination);
      expect(loaded).not.toBeNull();
      expect(loaded?.id).toBe(created.id);
      expect(loaded?.destinationPath).toBe(destination);
      expect(loaded?.expectedSize).toBe(4000);
      expect(loaded?.supportsRange).toBe(true);
      expect(loaded?.checksumAlgorithm).toBe('sha256');
      expect(loaded?.workerCount).toBe(4);
      expect(loaded?.chunks.map(c => [c.id, c.startOffset, c.endOffset, c.bytesWritten, c.status])).toEqual([
        [0, 0, 1000, 0, 'pending'],
        [1, 1000, 2000, 0, 'pending'],
        [2, 2000, 3000, 0, 'pending'],
        [3, 3000, 4000, 0, 'pending'],
      ]);
    });

    it('hasRecord refleja la existencia del registro', () => {
      expect(store.hasRecord(RECORD_URL, destination)).toBe(false);
      store.create(newRecord());
      expect(store.hasRecord(RECORD_URL, destination)).toBe(true);
    });

    it('create reemplaza un registro previo del mismo destino', () => {
      store.create(newRecord());
      store.create(newRecord({ workerCount: 2, chunks: planChunks(4000, 2, 100) }));
      const loaded = store.load(RECORD_URL, destination);
      expect(loaded?.workerCount).toBe(2);
      expect(loaded?.chunks).toHaveLength(2);
    });

    it('guarda tamaño desconocido y sin checksum', () => {
      store.create(
        newRecord({
          expectedSize: null,
          supportsRange: false,
          checksumAlgorithm: null,
          workerCount: 1,
          chunks: planChunks(null, 1, 100),
        })
      );
      const loaded = store.load(RECORD_URL, destination);
      expect(loaded?.expectedSize).toBeNull();
      expect(loaded?.checksumAlgorithm).toBeNull();
      expect(loaded?.chunks[0].endOffset).toBeNull();
    });

    it('devuelve null si no hay registro', () => {
      expect(store.load(RECORD_URL, destination)).toBeNull();
    });

    it('descarta y elimina un registro con filas inválidas', () => {
      store.create(newRecord());
      const raw = new Database(dbPath);
      raw.prepare("UPDATE resume_records SET checksum_algorithm = 'crc32'").run();
      raw.close();

      expect(store.load(RECORD_URL, destination)).toBeNull();
      expect(store.hasRecord(RECORD_URL, destination)).toBe(false);
    });

    it('descarta un chunk con bytes fuera de su rango', () => {
      store.create(newRecord());
      const raw = new Database(dbPath);
      raw.prepare('UPDATE resume_chunks SET bytes_written = 5000 WHERE chunk_index = 0').run();
      raw.close();

      expect(store.load(RECORD_URL, destination)).toBeNull();
    });
  });

  describe('mergeProgress', () => {
    it('solo aumenta bytes_written y complete no retrocede', () => {
      const { id } = store.create(newRecord());
      store.mergeProgress(id, [{ chunkIndex: 0, bytesWritten: 600, complete: false }]);
      store.mergeProgress(id, [{ chunkIndex: 0, bytesWritten: 200, complete: false }]);
      store.mergeProgress(id, [{ chunkIndex: 1, bytesWritten: 1000, complete: true }]);
      store.mergeProgress(id, [{ chunkIndex: 1, bytesWritten: 1000, complete: false }]);

      const chunks = store.load(RECORD_URL, destination)?.chunks ?? [];
      expect(chunks[0].bytesWritten).toBe(600);
      expect(chunks[0].status).toBe('pending');
      expect(chunks[1].bytesWritten).toBe(1000);
      expect(chunks[1].status).toBe('complete');
    });

    it('ignora una lista vacía', () => {
      const { id } = store.create(newRecord());
      expect(() => store.mergeProgress(id, [])).not.toThrow();
    });
  });

  describe('resetChunk', () => {
    it('vuelve un chunk a 0 bytes y pendiente', () => {
      const { id } = store.create(newRecord());
      store.mergeProgress(id, [{ chunkIndex: 2, bytesWritten: 1000, complete: true }]);
      store.resetChunk(id, 2);
      const chunk = store.load(RECORD_URL, destination)?.chunks[2];
      expect(chunk?.bytesWritten).toBe(0);
      expect(chunk?.status).toBe('pending');
    });
  });

  describe('delete', () => {
    it('elimina el registro y sus chunks', () => {
      store.create(newRecord());
      expect(store.delete(RECORD_URL, destination)).toBe(true);
      expect(store.delete(RECORD_URL, destination)).toBe(false);
      expect(store.load(RECORD_URL, destination)).toBeNull();

      const raw = new Database(dbPath);
      const row = raw.prepare('SELECT COUNT(*) AS n FROM resume_chunks').get();
      raw.close();
      expect(row).toEqual({ n: 0 });
    });
  });

  describe('close', () => {
    it('impide operar tras cerrar', () => {
      store.close();
      expect(() => store.hasRecord(RECORD_URL, destination)).toThrow();
    });
  });
});
