/**
 * Programa de línea de órdenes: single, batch y accelerated.
 *
 * Cada acción crea un DownloadService, conecta el TerminalRenderer a sus eventos y
 * traduce la respuesta a un código de salida (0 todo bien; n tareas no exitosas, máx.
 * 125; 2 entrada inválida).
 *
 * @module cli/program
 */

import { Command, CommanderError } from 'commander';
import packageJson from '../../package.json';
import { logger } from '../utils/logger';
import DownloadService, { EXIT_INVALID_INPUT } from '../services/DownloadService';
import type { DownloadServiceOptions, RunHooks } from '../services/DownloadService';
import type { ServiceResponse } from '../services/BaseService';
import { TerminalRenderer } from './renderer';
import type { OutputStream } from './renderer';

const log = logger.child('CLI');

/** Códigos de error de servicio que corresponden a entrada inválida. */
const INPUT_ERROR_CODES = new Set(['INVALID_INPUT', 'URLS_FILE_EMPTY', 'URLS_FILE_READ_FAILED']);

export interface CliContext {
  stdout?: OutputStream;
  stderr?: OutputStream;
  signal?: AbortSignal;
  serviceOptions?: DownloadServiceOptions;
}

interface CommonCliOptions {
  timeout?: string;
  retries?: string;
  userAgent?: string;
  header: string[];
  resume?: boolean;
  maxSize?: string;
  force?: boolean;
  deleteOnMismatch?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

interface SingleCliOptions extends CommonCliOptions {
  output?: string;
  checksum?: string;
  workers?: string;
}

interface AcceleratedCliOptions extends CommonCliOptions {
  output?: string;
  checksum?: string;
  parts?: string;
}

interface BatchCliOptions extends CommonCliOptions {
  outputDir?: string;
  concurrency?: string;
  parts?: string;
  continueOnError?: boolean;
  format?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addRequestOptions(command: Command): Command {
  return command
    .option('-t, --timeout <seconds>', 'timeout de conexión y de inactividad en segundos')
    .option('--retries <n>', 'reintentos por parte ante errores transitorios')
    .option('-u, --user-agent <ua>', 'User-Agent de las peticiones')
    .option('-H, --header <header>', 'cabecera extra "Nombre: Valor" (repetible)', collect, [])
    .option('-r, --resume', 'reanudar una descarga interrumpida')
    .option('--max-size <size>', 'tamaño máximo aceptado (512, 10KB, 1.5MB, 2GB)')
    .option('--force', 'sobrescribir el destino en lugar de añadir un sufijo')
    .option('--delete-on-mismatch', 'borrar el archivo si el checksum no coincide')
    .option('-q, --quiet', 'sin progreso ni mensajes informativos')
    .option('--verbose', 'log de depuración en consola');
}

/** Opciones comunes ya con los nombres que esperan los schemas. */
function requestParams(options: CommonCliOptions): Record<string, unknown> {
  return {
    timeout: options.timeout,
    retries: options.retries,
    userAgent: options.userAgent,
    headers: options.header,
    resume: options.resume ?? false,
    maxSize: options.maxSize,
    overwrite: options.force ?? false,
    deleteOnMismatch: options.deleteOnMismatch ?? false,
    quiet: options.quiet ?? false,
  };
}

function exitCodeFromResponse<T extends { exitCode: number }>(
  response: ServiceResponse<T>,
  renderer: TerminalRenderer
): number {
  if (response.success && response.data) return response.data.exitCode;
  renderer.error(`Error: ${response.error ?? 'desconocido'}`);
  return response.code && INPUT_ERROR_CODES.has(response.code) ? EXIT_INVALID_INPUT : 1;
}

export function createProgram(context: CliContext, setExitCode: (_code: number) => void): Command {
  const stdout = context.stdout ?? process.stdout;
  const stderr = context.stderr ?? process.stderr;
  const program = new Command();

  program
    .name('rangefetch')
    .description('Descargas HTTP(S) con reanudación, partes en paralelo, checksum y lotes')
    .version(packageJson.version)
    .exitOverride()
    .configureOutput({
      writeOut: text => stdout.write(text),
      writeErr: text => stderr.write(text),
    });

  /** Prepara servicio y renderer, ejecuta la acción y libera recursos. */
  const withService = async (
    options: CommonCliOptions,
    action: (_service: DownloadService, _renderer: TerminalRenderer, _hooks: RunHooks) => Promise<number>
  ): Promise<void> => {
    if (options.verbose) logger.configure({ consoleLevel: 'debug' });
    const renderer = new TerminalRenderer({ quiet: options.quiet ?? false, stdout, stderr });
    const service = new DownloadService(context.serviceOptions);
    await service.initialize();
    const detach = renderer.attach(service.events);
    try {
      setExitCode(await action(service, renderer, { signal: context.signal }));
    } finally {
      detach();
      await service.destroy();
    }
  };

  addRequestOptions(
    program
      .command('single')
      .description('descargar una URL')
      .argument('<url>', 'URL http(s) a descargar')
      .option('-o, --output <path>', 'archivo o directorio de destino')
      .option('-c, --checksum <checksum>', 'checksum esperado (algoritmo:hex o hex)')
      .option('-w, --workers <n>', 'partes en paralelo si el servidor acepta Range')
  ).action(async (url: string, options: SingleCliOptions) => {
    await withService(options, async (service, renderer, hooks) => {
      const response = await service.downloadSingle(
        {
          ...requestParams(options),
          url,
          output: options.output,
          checksum: options.checksum,
          workers: options.workers,
        },
        { ...hooks, onProgress: snapshot => renderer.progress(snapshot) }
      );
      if (response.success && response.data) renderer.taskResult(response.data.result);
      return exitCodeFromResponse(response, renderer);
    });
  });

  addRequestOptions(
    program
      .command('accelerated')
      .description('descargar una URL en varias partes simultáneas')
      .argument('<url>', 'URL http(s) a descargar')
      .option('-o, --output <path>', 'archivo o directorio de destino')
      .option('-c, --checksum <checksum>', 'checksum esperado (algoritmo:hex o hex)')
      .option('-p, --parts <n>', 'número de partes')
  ).action(async (url: string, options: AcceleratedCliOptions) => {
    await withService(options, async (service, renderer, hooks) => {
      const response = await service.downloadAccelerated(
        {
          ...requestParams(options),
          url,
          output: options.output,
          checksum: options.checksum,
          parts: options.parts,
        },
        { ...hooks, onProgress: snapshot => renderer.progress(snapshot) }
      );
      if (response.success && response.data) renderer.taskResult(response.data.result);
      return exitCodeFromResponse(response, renderer);
    });
  });

  addRequestOptions(
    program
      .command('batch')
      .description('descargar las URLs de un archivo (una por línea)')
      .argument('<urlsFile>', 'archivo con URLs; se ignoran líneas vacías y las que empiezan por #')
      .option('-o, --output-dir <dir>', 'directorio de destino')
      .option('-c, --concurrency <n>', 'descargas simultáneas')
      .option('-p, --parts <n>', 'partes por descarga')
      .option('--continue-on-error', 'seguir con el resto de URLs si una falla')
      .option('--format <format>', 'formato del informe: table o json', 'table')
  ).action(async (urlsFile: string, options: BatchCliOptions) => {
    // El informe JSON va solo a stdout
    const json = options.format === 'json';
    await withService({ ...options, quiet: (options.quiet ?? false) || json }, async (service, renderer, hooks) => {
      const response = await service.downloadBatchFromFile(
        urlsFile,
        {
          ...requestParams(options),
          quiet: (options.quiet ?? false) || json,
          outputDir: options.outputDir,
          concurrency: options.concurrency,
          parts: options.parts,
          continueOnError: options.continueOnError ?? false,
          format: options.format,
        },
        {
          ...hooks,
          onTaskResult: json ? undefined : result => renderer.taskResult(result),
        }
      );
      if (response.success && response.data) {
        renderer.batchReport(response.data.result, response.data.format);
      }
      return exitCodeFromResponse(response, renderer);
    });
  });

  return program;
}

/** Código de salida tras Ctrl+C. */
export const EXIT_INTERRUPTED = 130;

/** Una ejecución interrumpida termina con 130, sea cual sea el resultado de las tareas. */
export function exitCodeAfterRun(code: number, interrupted: boolean): number {
  return interrupted ? EXIT_INTERRUPTED : code;
}

/** Ejecuta el CLI con argv completo (node, script, ...) y devuelve el código de salida. */
export async function runCli(argv: readonly string[], context: CliContext = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(context, code => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      log.debug(`commander: ${error.code}`);
      return error.exitCode === 0 ? 0 : EXIT_INVALID_INPUT;
    }
    throw error;
  }
  return exitCode;
}
