/**
 * @fileoverview Schemas de validación usando Zod para parámetros del CLI/servicios,
 * checksums, tamaños y filas persistidas del ResumeStore.
 * @module schemas
 */

import { z } from 'zod';
import config from '../config';
import {
  VALIDATIONS,
  MAX_WORKER_COUNT,
  MAX_BATCH_CONCURRENCY,
  MAX_RETRIES,
} from '../constants/validations';
import { parseChecksum } from '../engines/Verifier';
import { errorMessage } from './errorHelpers';
import { ChunkState } from '../engines/types';
import { parseSize } from './fileHelpers';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ZodValidationResult<T> {
  try {
    const result = schema.safeParse(data);

    if (result.success) {
      return {
        success: true,
        data: result.data,
      };
    }
    const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
      const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
      return `${pathStr}${err.message}`;
    });

    return {
      success: false,
      error: errorMessages.join('; '),
    };
  } catch (error) {
    return {
      success: false,
      error: `${VALIDATIONS.GENERIC.VALIDATION_ERROR}: ${errorMessage(error)}`,
    };
  }
}

// --- Valores simples ---

const httpUrlSchema = z
  .string()
  .trim()
  .superRefine((value, ctx) => {
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: VALIDATIONS.URL.INVALID });
      return;
    }
    if (!/^https?:$/i.test(protocol)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: VALIDATIONS.URL.UNSUPPORTED_PROTOCOL });
    }
  });

const checksumSchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const parsed = parseChecksum(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: VALIDATIONS.FORMAT.CHECKSUM_INVALID });
      return z.NEVER;
    }
    return parsed;
  });

const sizeSchema = z.union([z.number().int().nonnegative(), z.string()]).transform((value, ctx) => {
  const bytes = typeof value === 'number' ? value : parseSize(value);
  if (bytes === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: VALIDATIONS.FORMAT.SIZE_INVALID });
    return z.NEVER;
  }
  return bytes;
});

/** Lista "Nombre: Valor" → objeto de cabeceras. */
const headerListSchema = z
  .array(z.string().regex(/^[A-Za-z0-9!#$%&'*+.^_`|~-]+\s*:.*$/, VALIDATIONS.FORMAT.HEADER_INVALID))
  .default([])
  .transform(lines => {
    const headers: Record<string, string> = {};
    for (const line of lines) {
      const idx = line.indexOf(':');
      headers[line.slice(0, idx).trim()] = line.slice(idx + 1).trim();
    }
    return headers;
  });

const workerCountSchema = z.coerce
  .number()
  .int(VALIDATIONS.NUMBER.MUST_BE_INTEGER)
  .min(1, VALIDATIONS.NUMBER.WORKERS_RANGE)
  .max(MAX_WORKER_COUNT, VALIDATIONS.NUMBER.WORKERS_RANGE);

const outputPathSchema = z
  .string()
  .min(1, VALIDATIONS.PATH.CANNOT_BE_EMPTY)
  .max(4096, VALIDATIONS.PATH.TOO_LONG);

// --- Parámetros de servicios ---

const requestOptionsShape = {
  timeout: z.coerce.number().positive(VALIDATIONS.NUMBER.TIMEOUT_POSITIVE).optional(),
  retries: z.coerce
    .number()
    .int(VALIDATIONS.NUMBER.MUST_BE_INTEGER)
    .min(0, VALIDATIONS.NUMBER.RETRIES_RANGE)
    .max(MAX_RETRIES, VALIDATIONS.NUMBER.RETRIES_RANGE)
    .optional(),
  userAgent: z.string().trim().min(1).max(200).optional(),
  headers: headerListSchema,
  resume: z.boolean().default(false),
  maxSize: sizeSchema.optional(),
  overwrite: z.boolean().default(false),
  deleteOnMismatch: z.boolean().default(false),
  quiet: z.boolean().default(false),
};

const singleDownloadParamsSchema = z.object({
  ...requestOptionsShape,
  url: httpUrlSchema,
  output: outputPathSchema.optional(),
  checksum: checksumSchema.optional(),
  workers: workerCountSchema.default(1),
});

const acceleratedDownloadParamsSchema = z.object({
  ...requestOptionsShape,
  url: httpUrlSchema,
  output: outputPathSchema.optional(),
  checksum: checksumSchema.optional(),
  parts: workerCountSchema.default(config.downloads.defaultWorkerCount),
});

const batchDownloadParamsSchema = z.object({
  ...requestOptionsShape,
  urls: z.array(httpUrlSchema).min(1, VALIDATIONS.URL.LIST_EMPTY),
  outputDir: outputPathSchema.optional(),
  concurrency: z.coerce
    .number()
    .int(VALIDATIONS.NUMBER.MUST_BE_INTEGER)
    .min(1, VALIDATIONS.NUMBER.CONCURRENCY_RANGE)
    .max(MAX_BATCH_CONCURRENCY, VALIDATIONS.NUMBER.CONCURRENCY_RANGE)
    .default(config.batch.concurrencyLimit),
  parts: workerCountSchema.default(1),
  continueOnError: z.boolean().default(config.batch.continueOnError),
  format: z.enum(['table', 'json'], { message: VALIDATIONS.FORMAT.REPORT_FORMAT_INVALID }).default('table'),
});

export type SingleDownloadParams = z.infer<typeof singleDownloadParamsSchema>;
export type AcceleratedDownloadParams = z.infer<typeof acceleratedDownloadParamsSchema>;
export type BatchDownloadParams = z.infer<typeof batchDownloadParamsSchema>;
export type ReportFormat = BatchDownloadParams['format'];

// --- Filas persistidas del ResumeStore ---

const resumeRecordRowSchema = z.object({
  id: z.string().min(1),
  url: z.string().min(1),
  destination_path: z.string().min(1),
  expected_size: z.number().int().nonnegative().nullable(),
  supports_range: z.union([z.literal(0), z.literal(1)]),
  checksum_algorithm: z.string().nullable(),
  worker_count: z.number().int().positive(),
  created_at: z.number().int(),
  updated_at: z.number().int(),
});

const resumeChunkRowSchema = z
  .object({
    record_id: z.string().min(1),
    chunk_index: z.number().int().nonnegative(),
    start_offset: z.number().int().nonnegative(),
    end_offset: z.number().int().nonnegative().nullable(),
    bytes_written: z.number().int().nonnegative(),
    status: z.enum([ChunkState.PENDING, ChunkState.COMPLETE]),
  })
  .refine(
    row => row.end_offset === null || row.start_offset + row.bytes_written <= row.end_offset,
    'bytes_written fuera del rango del chunk'
  );

export type ResumeRecordRow = z.infer<typeof resumeRecordRowSchema>;
export type ResumeChunkRow = z.infer<typeof resumeChunkRowSchema>;

export function validateSingleDownloadParams(
  params: unknown
): ZodValidationResult<SingleDownloadParams> {
  return validate(singleDownloadParamsSchema, params);
}

export function validateAcceleratedDownloadParams(
  params: unknown
): ZodValidationResult<AcceleratedDownloadParams> {
  return validate(acceleratedDownloadParamsSchema, params);
}

export function validateBatchDownloadParams(
  params: unknown
): ZodValidationResult<BatchDownloadParams> {
  return validate(batchDownloadParamsSchema, params);
}

export function validateSize(value: unknown): ZodValidationResult<number> {
  return validate(sizeSchema, value);
}

export const schemas = {
  httpUrl: httpUrlSchema,
  checksum: checksumSchema,
  size: sizeSchema,
  headerList: headerListSchema,
  singleDownloadParams: singleDownloadParamsSchema,
  acceleratedDownloadParams: acceleratedDownloadParamsSchema,
  batchDownloadParams: batchDownloadParamsSchema,
  resumeRecordRow: resumeRecordRowSchema,
  resumeChunkRow: resumeChunkRowSchema,
};
