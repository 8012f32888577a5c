/**
 * @fileoverview Mensajes informativos del CLI (éxito, progreso, informes).
 * @module shared/constants/messages
 *
 * Fuente única de verdad para los textos que imprime el renderer; los errores viven en
 * shared/constants/errors.
 */

// =====================
// MENSAJES FIJOS
// =====================

export const SUCCESS_MESSAGES: Record<string, string> = {
  DOWNLOAD_COMPLETED: 'Descarga completada',
  CHECKSUM_VERIFIED: 'Checksum verificado',
  BATCH_COMPLETED: 'Lote completado',
};

export const INFO_MESSAGES: Record<string, string> = {
  VERIFYING: 'Verificando integridad...',
  FALLBACK_SINGLE_STREAM: 'Descarga en un solo flujo',
  BATCH_ABORTED: 'Lote detenido tras el primer fallo',
  CANCELLED: 'Cancelado por el usuario',
  NOT_STARTED: 'no iniciada',
};

// =====================
// FUNCIONES PARA MENSAJES DINÁMICOS
// =====================

/** Línea de inicio de una tarea. */
export function formatTaskStarted(destinationPath: string, chunkCount: number, resumed: boolean): string {
  const parts = chunkCount === 1 ? '1 parte' : `${chunkCount} partes`;
  return `${resumed ? 'Reanudando' : 'Descargando'} ${destinationPath} (${parts})`;
}

/**
 * Aviso de descarga en un solo flujo.
 *
 * @param reason - Motivo que dio el motor (sin Range, tamaño desconocido...).
 */
export function formatFallback(reason: string): string {
  return `${INFO_MESSAGES.FALLBACK_SINGLE_STREAM}: ${reason}`;
}

export function formatChunkRetry(chunkIndex: number, error: string): string {
  return `Parte ${chunkIndex + 1}: ${error}; reintentando`;
}

/** Resumen de un lote en una línea. */
export function formatBatchCounts(succeeded: number, failed: number, aborted: number): string {
  return `${succeeded} correcta(s), ${failed} fallida(s), ${aborted} cancelada(s)`;
}
