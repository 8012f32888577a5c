/**
 * Lectura de errores capturados sin depender de `instanceof Error`.
 *
 * Los errores de fs, net o stream pueden venir de otro realm (vm, runners de tests) y
 * no pasar `instanceof Error` aunque tengan code y message.
 *
 * @module utils/errorHelpers
 */

/** Código errno (ENOENT, ECONNRESET, ...) o código propio del error, si lo tiene. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}
