/**
 * Elección del nombre y la ruta de salida.
 *
 * Prioridad: ruta explícita, filename de Content-Disposition, último segmento de la URL
 * (final y luego original) y por último un nombre generado. Si la ruta resultante ya
 * existe y no es un destino de reanudación válido se añade un sufijo " (n)".
 *
 * @module NameResolver
 */

import crypto from 'crypto';
import path from 'path';
import { ERRORS } from '../constants/errors';
import { logger } from '../utils/logger';
import { sanitizeFilename, statOrNull, pathExists } from '../utils/fileHelpers';
import { ErrorKind } from '../../shared/types';
import { DownloadError } from './DownloadError';

const log = logger.child('NameResolver');

const MAX_SUFFIX = 9999;

function decodeExtValue(charset: string, encoded: string): string | null {
  try {
    if (/^iso-8859-1$|^latin1$/i.test(charset)) {
      return encoded.replace(/%([0-9a-f]{2})/gi, (_m, hex: string) =>
        String.fromCharCode(parseInt(hex, 16))
      );
    }
    return decodeURIComponent(encoded);
  } catch {
    return null;
  }
}

/**
 * Extrae el nombre de una cabecera Content-Disposition.
 * filename* (RFC 5987) tiene prioridad sobre filename="..." y filename=...
 */
export function parseContentDisposition(value: string | undefined): string | null {
  if (!value) return null;

  const extended = /filename\*\s*=\s*([^']*)'[^']*'([^;]+)/i.exec(value);
  if (extended) {
    const decoded = decodeExtValue(extended[1].trim() || 'utf-8', extended[2].trim().replace(/^"|"$/g, ''));
    if (decoded) return decoded;
  }

  const quoted = /filename\s*=\s*"((?:[^"\\]|\\.)*)"/i.exec(value);
  if (quoted) {
    return quoted[1].replace(/\\(.)/g, '$1');
  }

  const bare = /filename\s*=\s*([^;]+)/i.exec(value);
  if (bare) {
    const name = bare[1].trim();
    return name || null;
  }
  return null;
}

/**
 * Repara nombres UTF-8 que llegaron decodificados como Latin-1 ("cafÃ©" → "café").
 * Si la reinterpretación no produce UTF-8 válido se devuelve el original.
 */
export function repairMojibake(name: string): string {
  if (!/[\u0080-\u00ff]/.test(name) || /[^\u0000-\u00ff]/.test(name)) return name;
  const repaired = Buffer.from(name, 'latin1').toString('utf8');
  return repaired.includes('\uFFFD') ? name : repaired;
}

/** Último segmento de la ruta de la URL, decodificado. Debe contener un punto. */
export function filenameFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const segment = pathname.split('/').filter(Boolean).pop();
  if (!segment) return null;
  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // segmento con % mal formado: se usa tal cual
  }
  return decoded.includes('.') ? decoded : null;
}

/** Nombre determinista para URLs sin nombre utilizable. */
export function generateFallbackName(url: string): string {
  const hash = crypto.createHash('sha1').update(url).digest('hex').slice(0, 8);
  return `download-${hash}`;
}

export interface NameSources {
  url: string;
  finalUrl: string;
  suggestedName: string | null;
}

/** Nombre de archivo derivado (sin directorio), ya sanitizado. */
export function deriveFilename(sources: NameSources): string {
  const fromHeader = sources.suggestedName ? repairMojibake(sources.suggestedName) : null;
  const candidate =
    fromHeader ??
    filenameFromUrl(sources.finalUrl) ??
    filenameFromUrl(sources.url) ??
    generateFallbackName(sources.url);
  return sanitizeFilename(candidate);
}

/**
 * Ruta candidata: explícita (si es un directorio existente o acaba en separador se
 * usa como directorio) o el directorio de salida con el nombre derivado.
 */
export async function resolveOutputPath(
  explicitPath: string | null,
  outputDir: string,
  derivedName: string
): Promise<string> {
  if (explicitPath) {
    const endsWithSep = explicitPath.endsWith('/') || explicitPath.endsWith(path.sep);
    const stats = endsWithSep ? null : await statOrNull(explicitPath);
    if (endsWithSep || stats?.isDirectory()) {
      return path.resolve(explicitPath, derivedName);
    }
    return path.resolve(explicitPath);
  }
  return path.resolve(outputDir, derivedName);
}

/** Primera ruta libre con la forma "nombre (n).ext". */
export async function nextAvailablePath(
  candidate: string,
  isTaken: (_p: string) => Promise<boolean> = pathExists
): Promise<string> {
  if (!(await isTaken(candidate))) return candidate;
  const { dir, name, ext } = path.parse(candidate);
  for (let n = 1; n <= MAX_SUFFIX; n++) {
    const next = path.join(dir, `${name} (${n})${ext}`);
    if (!(await isTaken(next))) return next;
  }
  throw new DownloadError(ErrorKind.DISK, ERRORS.FILE.NO_FREE_NAME, { code: 'NO_FREE_NAME' });
}

export interface ResolveDestinationInput extends NameSources {
  explicitPath: string | null;
  outputDir: string;
  overwrite: boolean;
  resume: boolean;
  /** Indica si hay un ResumeRecord para (url, ruta). */
  hasResumeRecord: (_destinationPath: string) => boolean;
  /** Ruta reservada por otra tarea en curso; no sirve como destino de reanudación. */
  isReserved?: (_candidate: string) => boolean;
  /** Ocupación de rutas; por defecto, existencia en disco. */
  isTaken?: (_candidate: string) => Promise<boolean>;
}

export interface ResolvedDestination {
  path: string;
  /** true si la ruta se eligió por existir un registro de reanudación. */
  resumeTarget: boolean;
}

export async function resolveDestination(input: ResolveDestinationInput): Promise<ResolvedDestination> {
  const derived = deriveFilename(input);
  const candidate = await resolveOutputPath(input.explicitPath, input.outputDir, derived);

  const reserved = input.isReserved?.(candidate) ?? false;
  if (input.resume && !reserved && input.hasResumeRecord(candidate)) {
    return { path: candidate, resumeTarget: true };
  }
  if (input.overwrite) {
    return { path: candidate, resumeTarget: false };
  }
  const free = await nextAvailablePath(candidate, input.isTaken);
  if (free !== candidate) {
    log.info(`${candidate} ya existe; se usará ${free}`);
  }
  return { path: free, resumeTarget: false };
}
