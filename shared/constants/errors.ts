/**
 * @fileoverview Constantes de mensajes de error compartidas entre el motor y los renderers.
 * @module shared/constants/errors
 *
 * Fuente única de verdad para textos de error. core/constants/errors reexporta este módulo.
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS: Record<string, string> = {
  UNKNOWN: 'Error desconocido',
  UNEXPECTED: 'Error inesperado',
  OPERATION_FAILED: 'Error en la operación',
  INVALID_INPUT: 'Parámetros inválidos',
};

// =====================
// ERRORES DE DESCARGA
// =====================

export const DOWNLOAD_ERRORS: Record<string, string> = {
  START_FAILED: 'Error al iniciar descarga',
  CONNECTION_CLOSED: 'Conexión cerrada prematuramente',
  TOO_MANY_REDIRECTS: 'Demasiadas redirecciones',
  MULTIPLE_RETRIES_FAILED: 'Error después de múltiples reintentos',
  RANGE_IGNORED: 'El servidor ignoró la cabecera Range',
  RANGE_NOT_SATISFIABLE: 'Rango no satisfacible (416)',
  CONTENT_RANGE_MISMATCH: 'Content-Range no coincide con el rango pedido',
  SIZE_LIMIT_EXCEEDED: 'El tamaño del recurso supera el límite indicado',
  SIZE_MISMATCH: 'El tamaño final no coincide con el esperado',
  UNKNOWN_SIZE: 'No se pudo determinar el tamaño del recurso',
  CHECKSUM_MISMATCH: 'El checksum no coincide',
  UNSUPPORTED_CHECKSUM: 'Formato de checksum no soportado',
  PROBE_FAILED: 'Error obteniendo metadatos del recurso',
};

// =====================
// ERRORES DE RED
// =====================

export const NETWORK_ERRORS: Record<string, string> = {
  CONNECTION_FAILED: 'No se pudo conectar al servidor',
  UNREACHABLE: 'Servidor no alcanzable',
  TIMEOUT: 'Tiempo de espera agotado',
  IDLE_TIMEOUT: 'Sin datos del servidor durante demasiado tiempo',
  CONNECTION_RESET: 'Conexión reiniciada por el servidor',
};

// =====================
// ERRORES DE REANUDACIÓN
// =====================

export const RESUME_ERRORS: Record<string, string> = {
  INIT_FAILED: 'Error inicializando el almacén de reanudación',
  LOAD_FAILED: 'Error leyendo registro de reanudación',
  SAVE_FAILED: 'Error guardando registro de reanudación',
  DELETE_FAILED: 'Error eliminando registro de reanudación',
  INVALID_RECORD: 'Registro de reanudación inválido',
  INCOMPATIBLE: 'El registro de reanudación no coincide con la petición actual',
};

// =====================
// ERRORES DE ARCHIVOS
// =====================

export const FILE_ERRORS: Record<string, string> = {
  CREATE_DIRECTORY_FAILED: 'Error creando directorio',
  OPEN_FAILED: 'Error abriendo archivo de destino',
  WRITE_FAILED: 'Error escribiendo archivo',
  READ_FAILED: 'Error leyendo archivo',
  DELETE_FAILED: 'Error eliminando archivo',
  NO_FREE_NAME: 'No se encontró un nombre libre para el archivo de destino',
  URLS_FILE_EMPTY: 'No se encontraron URLs en el archivo',
  URLS_FILE_READ_FAILED: 'Error leyendo el archivo de URLs',
};

// =====================
// ERRORES DE BATCH
// =====================

export const BATCH_ERRORS: Record<string, string> = {
  ABORTED: 'Batch abortado tras el primer fallo',
  NOT_STARTED: 'Tarea cancelada antes de empezar',
};

// =====================
// OBJETO UNIFICADO
// =====================

/** Objeto unificado de errores por categoría. */
export interface ErrorsMap {
  GENERAL: Record<string, string>;
  DOWNLOAD: Record<string, string>;
  NETWORK: Record<string, string>;
  RESUME: Record<string, string>;
  FILE: Record<string, string>;
  BATCH: Record<string, string>;
}

export const ERRORS: ErrorsMap = {
  GENERAL: GENERAL_ERRORS,
  DOWNLOAD: DOWNLOAD_ERRORS,
  NETWORK: NETWORK_ERRORS,
  RESUME: RESUME_ERRORS,
  FILE: FILE_ERRORS,
  BATCH: BATCH_ERRORS,
};

export default ERRORS;
