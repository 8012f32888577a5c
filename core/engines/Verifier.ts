/**
 * Verificación de integridad: tamaño y checksum (md5, sha1, sha256, sha512).
 *
 * Single-stream alimenta un IncrementalDigest con los bytes a medida que se escriben;
 * multi-part recalcula el hash sobre el archivo ensamblado con calculateHash, ya que
 * los workers concurrentes no producen un stream ordenado.
 *
 * @module Verifier
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import { logger } from '../utils/logger';
import { ChecksumAlgorithm, DIGEST_HEX_LENGTH } from './types';
import type { ChecksumAlgorithmType, ExpectedChecksum } from './types';

const log = logger.child('Verifier');

const ALGORITHMS: readonly ChecksumAlgorithmType[] = Object.values(ChecksumAlgorithm);

function isChecksumAlgorithm(value: string): value is ChecksumAlgorithmType {
  return ALGORITHMS.some(algorithm => algorithm === value);
}

/**
 * Interpreta "algoritmo:hex" o un hex suelto cuyo algoritmo se infiere por su longitud.
 * Devuelve null si el formato no es válido.
 */
export function parseChecksum(text: string): ExpectedChecksum | null {
  const value = text.trim();
  const sep = value.indexOf(':');
  if (sep >= 0) {
    const algorithm = value.slice(0, sep).trim().toLowerCase().replace('-', '');
    const digest = value.slice(sep + 1).trim().toLowerCase();
    if (!isChecksumAlgorithm(algorithm)) return null;
    if (digest.length !== DIGEST_HEX_LENGTH[algorithm] || !/^[0-9a-f]+$/.test(digest)) return null;
    return { algorithm, digest };
  }
  const digest = value.toLowerCase();
  if (!/^[0-9a-f]+$/.test(digest)) return null;
  const algorithm = ALGORITHMS.find(a => DIGEST_HEX_LENGTH[a] === digest.length);
  return algorithm ? { algorithm, digest } : null;
}

/** Digest incremental alimentado con los bytes en el orden en que se escriben. */
export class IncrementalDigest {
  private hash: crypto.Hash;
  private _bytes = 0;

  constructor(readonly algorithm: ChecksumAlgorithmType) {
    this.hash = crypto.createHash(algorithm);
  }

  update(data: Buffer): void {
    this.hash.update(data);
    this._bytes += data.length;
  }

  /** Descarta lo acumulado (el servidor respondió 200 a una reanudación y se reescribe desde 0). */
  reset(): void {
    this.hash = crypto.createHash(this.algorithm);
    this._bytes = 0;
  }

  get bytes(): number {
    return this._bytes;
  }

  digest(): string {
    return this.hash.digest('hex');
  }
}

export interface VerifyFileResult {
  valid: boolean;
  sizeValid: boolean;
  hashValid: boolean | null;
  actualSize?: number;
  expectedSize?: number | null;
  actualHash?: string | null;
  expectedHash?: string | null;
  error?: string;
}

export default class Verifier {
  private readonly bufferSize = 1024 * 1024;

  /**
   * Comprueba tamaño del archivo (si se conoce) y opcionalmente el checksum.
   * precomputedHash evita releer el archivo cuando el digest se calculó en streaming.
   */
  async verifyFile(
    filePath: string,
    expectedSize: number | null,
    expected: ExpectedChecksum | null,
    precomputedHash: string | null = null
  ): Promise<VerifyFileResult> {
    const stats = await fs.stat(filePath);
    if (expectedSize !== null && stats.size !== expectedSize) {
      return {
        valid: false,
        sizeValid: false,
        hashValid: null,
        actualSize: stats.size,
        expectedSize,
        error: `Tamaño incorrecto: ${stats.size}/${expectedSize} bytes`,
      };
    }

    if (!expected) {
      return { valid: true, sizeValid: true, hashValid: null, actualSize: stats.size, expectedSize };
    }

    const actualHash = precomputedHash ?? (await this.calculateHash(filePath, expected.algorithm));
    const hashValid = actualHash.toLowerCase() === expected.digest.toLowerCase();
    if (!hashValid) {
      log.warn(`Checksum ${expected.algorithm} incorrecto: ${actualHash} !== ${expected.digest}`);
      return {
        valid: false,
        sizeValid: true,
        hashValid: false,
        actualSize: stats.size,
        expectedSize,
        actualHash,
        expectedHash: expected.digest,
        error: `Hash incorrecto: ${actualHash} !== ${expected.digest}`,
      };
    }

    return {
      valid: true,
      sizeValid: true,
      hashValid: true,
      actualSize: stats.size,
      expectedSize,
      actualHash,
      expectedHash: expected.digest,
    };
  }

  async calculateHash(filePath: string, algorithm: ChecksumAlgorithmType): Promise<string> {
    const hash = crypto.createHash(algorithm);
    const stats = await fs.stat(filePath);
    const fileHandle = await fs.open(filePath, 'r');
    const buffer = Buffer.allocUnsafe(this.bufferSize);
    let bytesRead = 0;

    try {
      while (bytesRead < stats.size) {
        const toRead = Math.min(buffer.length, stats.size - bytesRead);
        const { bytesRead: read } = await fileHandle.read(buffer, 0, toRead, bytesRead);
        if (read === 0) break;
        hash.update(buffer.subarray(0, read));
        bytesRead += read;
      }
      return hash.digest('hex');
    } finally {
      await fileHandle.close();
    }
  }
}
