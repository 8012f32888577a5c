/**
 * @fileoverview Reexporta las constantes de error definidas en shared para uso en el núcleo.
 * @module constants/errors
 *
 * La fuente de verdad es shared/constants/errors.ts.
 */

export {
  ERRORS,
  GENERAL_ERRORS,
  DOWNLOAD_ERRORS,
  NETWORK_ERRORS,
  RESUME_ERRORS,
  FILE_ERRORS,
  BATCH_ERRORS,
  type ErrorsMap,
} from '../../shared/constants/errors';

export { default } from '../../shared/constants/errors';
