/**
 * Tipos para la configuración centralizada del proceso.
 *
 * La implementación concreta y valores por defecto están en config.ts.
 */

export type ConfigLogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface AppConfig {
  /** Timeouts, redirecciones y cabeceras de las peticiones HTTP. */
  network: {
    connectTimeout: number;
    idleTimeout: number;
    maxRedirects: number;
    userAgent: string;
    retryAfterMaxMs: number;
  };
  /** Política de reintentos por chunk y por sondeo. */
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterFactor: number;
  };
  /** Parámetros del motor: plan de chunks, cadencias de progreso y persistencia. */
  downloads: {
    defaultWorkerCount: number;
    maxWorkerCount: number;
    minChunkSize: number;
    progressIntervalMs: number;
    resumeFlushIntervalMs: number;
    resumeFlushBytes: number;
    preallocateFile: boolean;
    deleteOnChecksumMismatch: boolean;
  };
  /** Límites del modo batch. */
  batch: {
    concurrencyLimit: number;
    continueOnError: boolean;
  };
  /** Rutas absolutas de estado (DB de reanudación, logs). */
  paths: {
    stateDir: string;
    resumeDbPath: string;
    logDir: string;
  };
  logging: {
    fileLevel: ConfigLogLevel;
    consoleLevel: ConfigLogLevel;
    maxSize: number;
  };
}
