/**
 * @fileoverview Utilidades para operaciones con archivos, tamaños y sanitización de nombres
 * @module fileHelpers
 */

import { promises as fsPromises } from 'fs';
import type { Stats } from 'fs';
import { MAX_FILENAME_LENGTH } from '../constants/validations';
import { logger } from './logger';
import { errnoCode } from './errorHelpers';

const log = logger.child('FileUtils');

/**
 * Sanitiza un nombre de archivo: caracteres inválidos a '_', controles eliminados,
 * puntos/espacios finales recortados y nombres reservados de dispositivo prefijados.
 */
export function sanitizeFilename(filename: string): string {
  if (!filename) return 'unnamed';

  let sanitized = filename
    .replace(/[<>:"|?*]/g, '_')
    .replace(/\\/g, '_')
    .replace(/\//g, '_')
    // Caracteres de control y DEL intencionados para sanitizar
    /* eslint-disable-next-line no-control-regex */
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .trim()
    .replace(/[. ]+$/, '');

  const reservedNames = /^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])(\..*)?$/i;
  if (reservedNames.test(sanitized)) {
    sanitized = `_${sanitized}`;
  }

  if (sanitized.length > MAX_FILENAME_LENGTH) {
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH);
  }

  if (!sanitized || sanitized === '.' || sanitized === '..') {
    sanitized = 'unnamed';
  }

  return sanitized;
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';
  if (bytes < 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));

  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + sizes[i];
}

/** Formatea segundos como "1h 02m 03s", "2m 05s" o "7s". */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const pad = (n: number): string => String(n).padStart(2, '0');
  if (h > 0) return `${h}h ${pad(m)}m ${pad(s)}s`;
  if (m > 0) return `${m}m ${pad(s)}s`;
  return `${s}s`;
}

const SIZE_UNITS: Readonly<Record<string, number>> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

/**
 * Convierte "512", "10KB", "1.5MB", "2gb" a bytes (múltiplos binarios).
 * Devuelve null si el texto no es un tamaño válido.
 */
export function parseSize(text: string): number | null {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([KMGT]?B)?\s*$/i.exec(text);
  if (!match) return null;
  const value = parseFloat(match[1]);
  const unit = (match[2] ?? 'B').toUpperCase();
  const multiplier = SIZE_UNITS[unit];
  if (multiplier === undefined || !Number.isFinite(value)) return null;
  return Math.floor(value * multiplier);
}

/** stat que devuelve null si la ruta no existe. */
export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fsPromises.stat(filePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await statOrNull(filePath)) !== null;
}

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/** Elimina un archivo si existe. Devuelve true si se eliminó. */
export async function safeUnlink(filePath: string): Promise<boolean> {
  try {
    await fsPromises.unlink(filePath);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    log.error('Error eliminando archivo:', { path: filePath, error: String(error) });
    throw error;
  }
}
