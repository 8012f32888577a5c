/**
 * Clase base para los servicios del CLI.
 *
 * Proporciona: name, log (logger.child), initialized, initialize(), destroy(), handleError()
 * y success() para respuestas tipadas. Los servicios concretos sobrescriben initialize()
 * y destroy() según sus dependencias.
 *
 * @module BaseService
 */

import { logger } from '../utils/logger';
import type { ScopedLogger } from '../utils/logger';
import { ERRORS } from '../constants/errors';
import { errnoCode, errorMessage } from '../utils/errorHelpers';

/** Respuesta estándar de servicios: success, data opcional, error/code/context en fallo. */
export interface ServiceResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  code?: string;
  context?: string;
}

export default class BaseService {
  readonly name: string;
  readonly log: ScopedLogger;
  protected initialized: boolean;

  constructor(name: string) {
    this.name = name;
    this.log = logger.child(`Service:${name}`);
    this.initialized = false;
  }

  async initialize(): Promise<void> {
    this.initialized = true;
    this.log.debug('Servicio inicializado');
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async destroy(): Promise<void> {
    this.initialized = false;
    this.log.debug('Servicio destruido');
  }

  /** Registra el error en log y devuelve ServiceResponse con success: false. */
  handleError<T = never>(error: unknown, context = ''): ServiceResponse<T> {
    const message = errorMessage(error);
    this.log.error(`Error en ${this.name}${context ? ` - ${context}` : ''}: ${message}`, error);
    return {
      success: false,
      error: message || ERRORS.GENERAL.UNKNOWN,
      code: errnoCode(error),
      context,
    };
  }

  /** Fallo esperado (validación, entrada del usuario): sin traza de error. */
  failure<T = never>(error: string, code: string, context = ''): ServiceResponse<T> {
    this.log.warn(`${context || this.name}: ${error}`);
    return { success: false, error, code, context };
  }

  /** Devuelve ServiceResponse con success: true y data. */
  success<T>(data: T, message = ''): ServiceResponse<T> {
    return {
      success: true,
      data,
      message,
    };
  }
}
