#!/usr/bin/env node
/**
 * Punto de entrada del binario rangefetch.
 *
 * Ctrl+C cancela de forma cooperativa: los workers guardan su progreso en el
 * ResumeRecord antes de salir. Un segundo Ctrl+C termina el proceso de inmediato.
 *
 * @module main
 */

import { EXIT_INTERRUPTED, exitCodeAfterRun, runCli } from './cli/program';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errorHelpers';

const log = logger.child('Main');

const controller = new AbortController();
let interrupted = false;

process.on('SIGINT', () => {
  if (interrupted) process.exit(EXIT_INTERRUPTED);
  interrupted = true;
  log.warn('SIGINT recibido; cancelando descargas');
  controller.abort();
});

runCli(process.argv, { signal: controller.signal })
  .then(code => {
    process.exitCode = exitCodeAfterRun(code, interrupted);
  })
  .catch((error: unknown) => {
    log.error('Error fatal:', error);
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    process.exitCode = exitCodeAfterRun(1, interrupted);
  });
