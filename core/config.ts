/**
 * Configuración por defecto del proceso (valores de runtime).
 *
 * Aquí se definen timeouts, política de reintentos, parámetros del motor de descargas,
 * límites del batch y rutas de estado. Algunas claves admiten override por variables de
 * entorno (RANGEFETCH_*), validadas con zod; los flags del CLI se aplican por instancia
 * de DownloadEngine sin modificar este objeto.
 *
 * @module config
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import type { AppConfig } from './config.d';

const envSchema = z.object({
  RANGEFETCH_STATE_DIR: z.string().min(1).optional(),
  RANGEFETCH_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).optional(),
  RANGEFETCH_USER_AGENT: z.string().min(1).max(200).optional(),
});

const parsedEnv = envSchema.safeParse(process.env);
// Variables mal formadas se ignoran: se usan los valores por defecto
const env = parsedEnv.success ? parsedEnv.data : {};

const stateDir = path.resolve(env.RANGEFETCH_STATE_DIR ?? path.join(os.homedir(), '.rangefetch'));

const config: AppConfig = {
  network: {
    connectTimeout: 10000,
    idleTimeout: 30000,
    maxRedirects: 5,
    userAgent: env.RANGEFETCH_USER_AGENT ?? 'rangefetch/1.0',
    retryAfterMaxMs: 300000,
  },

  retry: {
    maxAttempts: 4,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    jitterFactor: 0.3,
  },

  downloads: {
    defaultWorkerCount: 4,
    maxWorkerCount: 16,
    // Por debajo de este tamaño el overhead por conexión domina
    minChunkSize: 1024 * 1024,
    progressIntervalMs: 250,
    resumeFlushIntervalMs: 1000,
    resumeFlushBytes: 4 * 1024 * 1024,
    preallocateFile: true,
    deleteOnChecksumMismatch: false,
  },

  batch: {
    concurrencyLimit: 4,
    continueOnError: false,
  },

  paths: {
    stateDir,
    resumeDbPath: path.join(stateDir, 'resume.db'),
    logDir: path.join(stateDir, 'logs'),
  },

  logging: {
    fileLevel: env.RANGEFETCH_LOG_LEVEL ?? 'info',
    consoleLevel: 'warn',
    maxSize: 10 * 1024 * 1024,
  },
};

export default config;
