/**
 * Almacén durable de registros de reanudación (SQLite WAL, archivo resume.db).
 *
 * Tablas: resume_records (una fila por tarea, clave estable derivada de url + destino)
 * y resume_chunks (límites y bytes escritos por chunk). Las actualizaciones de progreso
 * son un merge monótono: bytes_written = MAX(actual, nuevo) y 'complete' no retrocede.
 * Las filas leídas se validan con zod; un registro inválido se descarta, nunca se usa.
 *
 * @module ResumeStore
 */

import Database from 'better-sqlite3';
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import config from '../config';
import { ERRORS } from '../constants/errors';
import { logger } from '../utils/logger';
import { schemas } from '../utils/schemas';
import { ChunkState, ChecksumAlgorithm } from './types';
import type { Chunk, ChecksumAlgorithmType } from './types';

const log = logger.child('ResumeStore');

const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS resume_records (
    id TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    destination_path TEXT NOT NULL,
    expected_size INTEGER,
    supports_range INTEGER NOT NULL DEFAULT 0,
    checksum_algorithm TEXT,
    worker_count INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
);
CREATE TABLE IF NOT EXISTS resume_chunks (
    record_id TEXT NOT NULL,
    chunk_index INTEGER NOT NULL,
    start_offset INTEGER NOT NULL,
    end_offset INTEGER,
    bytes_written INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'pending',
    PRIMARY KEY (record_id, chunk_index),
    FOREIGN KEY (record_id) REFERENCES resume_records(id) ON DELETE CASCADE,
    CHECK(status IN ('pending', 'complete'))
);
CREATE INDEX IF NOT EXISTS idx_resume_chunks_record ON resume_chunks(record_id);
`;

export interface ResumeRecord {
  id: string;
  url: string;
  destinationPath: string;
  expectedSize: number | null;
  supportsRange: boolean;
  checksumAlgorithm: ChecksumAlgorithmType | null;
  workerCount: number;
  chunks: Chunk[];
  createdAt: number;
  updatedAt: number;
}

export type NewResumeRecord = Omit<ResumeRecord, 'id' | 'createdAt' | 'updatedAt'>;

export interface ChunkProgressUpdate {
  chunkIndex: number;
  bytesWritten: number;
  complete: boolean;
}

interface RecordParams {
  id: string;
  url: string;
  destination_path: string;
  expected_size: number | null;
  supports_range: number;
  checksum_algorithm: string | null;
  worker_count: number;
  created_at: number;
  updated_at: number;
}

interface ChunkParams {
  record_id: string;
  chunk_index: number;
  start_offset: number;
  end_offset: number | null;
  bytes_written: number;
  status: string;
}

interface MergeParams {
  record_id: string;
  chunk_index: number;
  bytes_written: number;
  complete: number;
}

interface ResumeStoreStatements {
  insertRecord: Database.Statement<[RecordParams], unknown>;
  insertChunk: Database.Statement<[ChunkParams], unknown>;
  getRecord: Database.Statement<[string], unknown>;
  getChunks: Database.Statement<[string], unknown>;
  mergeChunk: Database.Statement<[MergeParams], unknown>;
  resetChunk: Database.Statement<[string, number], unknown>;
  touchRecord: Database.Statement<[number, string], unknown>;
  deleteRecord: Database.Statement<[string], unknown>;
  hasRecord: Database.Statement<[string], unknown>;
}

/** undefined si el algoritmo guardado no es uno conocido. */
function checksumAlgorithmOf(value: string | null): ChecksumAlgorithmType | null | undefined {
  if (value === null) return null;
  return Object.values(ChecksumAlgorithm).find(a => a === value);
}

/**
 * Fuente de verdad para reanudar: la longitud del archivo no se usa sola porque un
 * archivo preasignado puede ser más largo que lo realmente escrito.
 */
export class ResumeStore {
  private _db: Database.Database | null = null;
  private statements: ResumeStoreStatements | null = null;
  private _initialized = false;
  private readonly dbPath: string;

  constructor(dbPath: string = config.paths.resumeDbPath) {
    this.dbPath = dbPath;
  }

  get isInitialized(): boolean {
    return this._initialized;
  }

  /** Clave estable derivada de (url, destino absoluto). */
  static recordId(url: string, destinationPath: string): string {
    return crypto
      .createHash('sha256')
      .update(`${url}\n${path.resolve(destinationPath)}`)
      .digest('hex');
  }

  /**
   * Crea el directorio de la DB si no existe, abre resume.db con WAL, ejecuta el schema
   * y prepara statements.
   *
   * @returns true si la inicialización fue correcta.
   */
  initialize(): boolean {
    if (this._initialized) return true;

    try {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      this._db = new Database(this.dbPath);
      this._db.pragma('journal_mode = WAL');
      this._db.pragma('synchronous = NORMAL');
      this._db.pragma('foreign_keys = ON');
      this._db.exec(CREATE_SCHEMA_SQL);
      this.statements = this._prepareStatements(this._db);
      this._initialized = true;
      log.debug(`ResumeStore inicializado: ${this.dbPath}`);
      return true;
    } catch (error) {
      log.error(`${ERRORS.RESUME.INIT_FAILED}:`, error);
      this.close();
      return false;
    }
  }

  private _prepareStatements(db: Database.Database): ResumeStoreStatements {
    return {
      insertRecord: db.prepare<[RecordParams]>(`
        INSERT INTO resume_records
          (id, url, destination_path, expected_size, supports_range, checksum_algorithm, worker_count, created_at, updated_at)
        VALUES
          (@id, @url, @destination_path, @expected_size, @supports_range, @checksum_algorithm, @worker_count, @created_at, @updated_at)
      `),
      insertChunk: db.prepare<[ChunkParams]>(`
        INSERT INTO resume_chunks (record_id, chunk_index, start_offset, end_offset, bytes_written, status)
        VALUES (@record_id, @chunk_index, @start_offset, @end_offset, @bytes_written, @status)
      `),
      getRecord: db.prepare<[string]>('SELECT * FROM resume_records WHERE id = ?'),
      getChunks: db.prepare<[string]>(
        'SELECT * FROM resume_chunks WHERE record_id = ? ORDER BY chunk_index ASC'
      ),
      mergeChunk: db.prepare<[MergeParams]>(`
        UPDATE resume_chunks
        SET bytes_written = MAX(bytes_written, @bytes_written),
            status = CASE WHEN status = 'complete' OR @complete = 1 THEN 'complete' ELSE 'pending' END
        WHERE record_id = @record_id AND chunk_index = @chunk_index
      `),
      resetChunk: db.prepare<[string, number]>(
        "UPDATE resume_chunks SET bytes_written = 0, status = 'pending' WHERE record_id = ? AND chunk_index = ?"
      ),
      touchRecord: db.prepare<[number, string]>(
        'UPDATE resume_records SET updated_at = ? WHERE id = ?'
      ),
      deleteRecord: db.prepare<[string]>('DELETE FROM resume_records WHERE id = ?'),
      hasRecord: db.prepare<[string]>('SELECT 1 FROM resume_records WHERE id = ?'),
    };
  }

  private _requireStatements(): ResumeStoreStatements {
    if (!this.statements) {
      throw new Error(ERRORS.RESUME.INIT_FAILED);
    }
    return this.statements;
  }

  private _requireDb(): Database.Database {
    if (!this._db) {
      throw new Error(ERRORS.RESUME.INIT_FAILED);
    }
    return this._db;
  }

  hasRecord(url: string, destinationPath: string): boolean {
    const stmts = this._requireStatements();
    return stmts.hasRecord.get(ResumeStore.recordId(url, destinationPath)) !== undefined;
  }

  /**
   * Carga y valida el registro de (url, destino). Un registro con filas inválidas
   * se elimina y se devuelve null.
   */
  load(url: string, destinationPath: string): ResumeRecord | null {
    const stmts = this._requireStatements();
    const id = ResumeStore.recordId(url, destinationPath);
    const rawRecord = stmts.getRecord.get(id);
    if (rawRecord === undefined) return null;

    const recordRow = schemas.resumeRecordRow.safeParse(rawRecord);
    const chunkRows = stmts.getChunks.all(id).map(row => schemas.resumeChunkRow.safeParse(row));
    const algorithm = recordRow.success ? checksumAlgorithmOf(recordRow.data.checksum_algorithm) : undefined;

    if (!recordRow.success || algorithm === undefined || chunkRows.some(r => !r.success)) {
      log.warn(`${ERRORS.RESUME.INVALID_RECORD}: ${destinationPath}`);
      this.deleteById(id);
      return null;
    }

    const chunks: Chunk[] = [];
    for (const parsed of chunkRows) {
      if (!parsed.success) continue;
      const row = parsed.data;
      chunks.push({
        id: row.chunk_index,
        startOffset: row.start_offset,
        endOffset: row.end_offset,
        bytesWritten: row.bytes_written,
        status: row.status === ChunkState.COMPLETE ? ChunkState.COMPLETE : ChunkState.PENDING,
        attemptCount: 0,
      });
    }

    const row = recordRow.data;
    return {
      id: row.id,
      url: row.url,
      destinationPath: row.destination_path,
      expectedSize: row.expected_size,
      supportsRange: row.supports_range === 1,
      checksumAlgorithm: algorithm,
      workerCount: row.worker_count,
      chunks,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  /** Crea (o reemplaza) el registro de una tarea con su plan de chunks. */
  create(input: NewResumeRecord): ResumeRecord {
    const db = this._requireDb();
    const stmts = this._requireStatements();
    const id = ResumeStore.recordId(input.url, input.destinationPath);
    const now = Date.now();

    const tx = db.transaction(() => {
      stmts.deleteRecord.run(id);
      stmts.insertRecord.run({
        id,
        url: input.url,
        destination_path: path.resolve(input.destinationPath),
        expected_size: input.expectedSize,
        supports_range: input.supportsRange ? 1 : 0,
        checksum_algorithm: input.checksumAlgorithm,
        worker_count: input.workerCount,
        created_at: now,
        updated_at: now,
      });
      for (const chunk of input.chunks) {
        stmts.insertChunk.run({
          record_id: id,
          chunk_index: chunk.id,
          start_offset: chunk.startOffset,
          end_offset: chunk.endOffset,
          bytes_written: chunk.bytesWritten,
          status: chunk.status === ChunkState.COMPLETE ? ChunkState.COMPLETE : ChunkState.PENDING,
        });
      }
    });
    tx();

    return {
      ...input,
      id,
      destinationPath: path.resolve(input.destinationPath),
      chunks: input.chunks.map(c => ({ ...c })),
      createdAt: now,
      updatedAt: now,
    };
  }

  /** Merge monótono de progreso en una sola transacción. */
  mergeProgress(recordId: string, updates: readonly ChunkProgressUpdate[]): void {
    if (updates.length === 0) return;
    const db = this._requireDb();
    const stmts = this._requireStatements();
    const tx = db.transaction(() => {
      for (const u of updates) {
        stmts.mergeChunk.run({
          record_id: recordId,
          chunk_index: u.chunkIndex,
          bytes_written: u.bytesWritten,
          complete: u.complete ? 1 : 0,
        });
      }
      stmts.touchRecord.run(Date.now(), recordId);
    });
    tx();
  }

  /** Única operación no monótona: vuelve un chunk a 0 bytes. */
  resetChunk(recordId: string, chunkIndex: number): void {
    const stmts = this._requireStatements();
    stmts.resetChunk.run(recordId, chunkIndex);
    stmts.touchRecord.run(Date.now(), recordId);
  }

  delete(url: string, destinationPath: string): boolean {
    return this.deleteById(ResumeStore.recordId(url, destinationPath));
  }

  deleteById(recordId: string): boolean {
    const stmts = this._requireStatements();
    const result = stmts.deleteRecord.run(recordId);
    return result.changes > 0;
  }

  close(): void {
    if (this._db) {
      try {
        this._db.close();
      } catch (error) {
        log.error('Error cerrando ResumeStore:', error);
      }
    }
    this._db = null;
    this.statements = null;
    this._initialized = false;
  }
}

export default ResumeStore;
