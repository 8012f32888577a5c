/**
 * @fileoverview Constantes de validación: límites numéricos y mensajes de error de validación.
 * @module constants/validations
 *
 * Usado en los schemas Zod de parámetros del CLI, checksums, tamaños y registros de reanudación.
 */

// =====================
// LÍMITES NUMÉRICOS
// =====================

/** Longitud máxima de nombre de archivo (estándar en muchos sistemas de archivos). */
export const MAX_FILENAME_LENGTH = 255;

/** Máximo de workers (conexiones) por tarea. */
export const MAX_WORKER_COUNT = 16;

/** Máximo de tareas simultáneas en un batch. */
export const MAX_BATCH_CONCURRENCY = 32;

/** Máximo de reintentos configurables por petición. */
export const MAX_RETRIES = 20;

// =====================
// VALIDACIONES DE URL
// =====================

const URL_VALIDATIONS: Record<string, string> = {
  INVALID: 'URL inválida',
  UNSUPPORTED_PROTOCOL: 'Solo se admiten URLs http:// y https://',
  LIST_EMPTY: 'La lista de URLs está vacía',
};

// =====================
// VALIDACIONES NUMÉRICAS
// =====================

const NUMBER_VALIDATIONS: Record<string, string> = {
  WORKERS_RANGE: `El número de workers debe estar entre 1 y ${MAX_WORKER_COUNT}`,
  CONCURRENCY_RANGE: `La concurrencia debe estar entre 1 y ${MAX_BATCH_CONCURRENCY}`,
  RETRIES_RANGE: `Los reintentos deben estar entre 0 y ${MAX_RETRIES}`,
  TIMEOUT_POSITIVE: 'El timeout debe ser un número positivo de segundos',
  MUST_BE_INTEGER: 'Debe ser un número entero',
};

// =====================
// VALIDACIONES DE FORMATO
// =====================

const FORMAT_VALIDATIONS: Record<string, string> = {
  SIZE_INVALID: 'Tamaño inválido (ejemplos: 512, 10KB, 1.5MB, 2GB)',
  CHECKSUM_INVALID:
    'Checksum inválido: usa algoritmo:hex (md5, sha1, sha256, sha512) o un hex de 32, 40, 64 o 128 caracteres',
  HEADER_INVALID: 'Cabecera inválida: usa el formato "Nombre: Valor"',
  REPORT_FORMAT_INVALID: 'Formato de reporte inválido (table o json)',
};

// =====================
// VALIDACIONES DE RUTA
// =====================

const PATH_VALIDATIONS: Record<string, string> = {
  TOO_LONG: 'La ruta es demasiado larga',
  CANNOT_BE_EMPTY: 'La ruta no puede estar vacía',
};

// =====================
// VALIDACIONES GENÉRICAS
// =====================

const GENERIC_VALIDATIONS: Record<string, string> = {
  VALIDATION_ERROR: 'Error de validación',
};

export interface ValidationsMap {
  URL: Record<string, string>;
  NUMBER: Record<string, string>;
  FORMAT: Record<string, string>;
  PATH: Record<string, string>;
  GENERIC: Record<string, string>;
}

export const VALIDATIONS: ValidationsMap = {
  URL: URL_VALIDATIONS,
  NUMBER: NUMBER_VALIDATIONS,
  FORMAT: FORMAT_VALIDATIONS,
  PATH: PATH_VALIDATIONS,
  GENERIC: GENERIC_VALIDATIONS,
};
