/**
 * @fileoverview Sistema de logging centralizado (electron-log en modo Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child), formato de objetos y operaciones cronometradas.
 * El archivo de log vive en el directorio de estado; la consola queda en 'warn' salvo --verbose.
 */

import log from 'electron-log/node';
import path from 'path';
import config from '../config';
import type { ConfigLogLevel } from '../config.d';

export type LogLevel = ConfigLogLevel;

export interface ConfigureLoggerOptions {
  fileLevel?: LogLevel | false;
  consoleLevel?: LogLevel | false;
  maxSize?: number;
  logDir?: string;
}

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  if (typeof obj === 'object' && obj !== null && 'stack' in obj && typeof obj.stack === 'string') {
    return obj.stack;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

type Method = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: Method) =>
    (...args: unknown[]): void => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    verbose: logMethod('verbose'),
    debug: logMethod('debug'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.debug(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura el logger global (archivo y consola).
 * Bajo NODE_ENV=test ambos transports quedan desactivados.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): void {
  const {
    fileLevel = config.logging.fileLevel,
    consoleLevel = config.logging.consoleLevel,
    maxSize = config.logging.maxSize,
    logDir = config.paths.logDir,
  } = options;

  const isTest = process.env.NODE_ENV === 'test';

  log.transports.file.level = isTest ? false : fileLevel;
  log.transports.file.maxSize = maxSize;
  log.transports.file.resolvePathFn = () => path.join(logDir, 'rangefetch.log');
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';

  log.transports.console.level = isTest ? false : consoleLevel;
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';
}

export interface LoggerInstance {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  child: (_scope: string) => ScopedLogger;
  configure: typeof configureLogger;
}

export const logger: LoggerInstance = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
  configure: configureLogger,
};

// Valores por defecto hasta que el CLI llame a configure()
configureLogger();

export { logger as log };
