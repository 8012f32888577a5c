/**
 * Utilidades comunes de tests: directorios temporales, cuerpos deterministas y
 * ajustes del motor con esperas cortas.
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { EngineSettings } from '../../core/engines/types';

export async function makeTempDir(prefix = 'rangefetch-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Bytes pseudoaleatorios reproducibles (mismo seed, mismo contenido). */
export function makeBody(size: number, seed = 1): Buffer {
  const body = Buffer.alloc(size);
  let state = seed >>> 0 || 1;
  for (let i = 0; i < size; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    body[i] = state >>> 24;
  }
  return body;
}

export function sha256(data: Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

/** Reintentos inmediatos y chunks pequeños. */
export const FAST_SETTINGS: EngineSettings = {
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 5,
  jitterFactor: 0,
  connectTimeout: 2000,
  idleTimeout: 2000,
  minChunkSize: 1024,
  progressIntervalMs: 20,
  resumeFlushIntervalMs: 10,
  resumeFlushBytes: 64 * 1024,
};
