import os from 'node:os';
import { z } from 'zod';

const MINUTE = 60_000;

const intFromEnv = (name: string, min: number, max: number, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(min, `${name} must be >= ${min}`)
    .max(max, `${name} must be <= ${max}`)
    .default(fallback);

const optionalString = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : fallback));

const envSchema = z.object({
  PORT: intFromEnv('PORT', 1, 65535, 3200),
  WORKER_CONCURRENCY: intFromEnv('WORKER_CONCURRENCY', 1, 16, 2),
  CONVERSION_TIMEOUT_MS: intFromEnv('CONVERSION_TIMEOUT_MS', 1000, 30 * MINUTE, 2 * MINUTE),
  ARCHIVE_TTL_MS: intFromEnv('ARCHIVE_TTL_MS', 1000, 24 * 60 * MINUTE, 15 * MINUTE),
  JOB_TTL_MS: intFromEnv('JOB_TTL_MS', 1000, 7 * 24 * 60 * MINUTE, 60 * MINUTE),
  SWEEP_INTERVAL_MS: intFromEnv('SWEEP_INTERVAL_MS', 100, 60 * MINUTE, MINUTE),
  MAX_FILE_MB: intFromEnv('MAX_FILE_MB', 1, 1024, 50),
  MAX_FILES: intFromEnv('MAX_FILES', 1, 1000, 200),
  TMP_DIR: optionalString(os.tmpdir()),
  METRICS_PATH: optionalString('./metrics'),
  OCR_LANG: optionalString('eng'),
  SOFFICE_BIN: optionalString('soffice'),
  PDFTOPPM_BIN: optionalString('pdftoppm'),
  PDFTOTEXT_BIN: optionalString('pdftotext'),
});

export type Config = {
  port: number;
  workerConcurrency: number;
  conversionTimeoutMs: number;
  archiveTtlMs: number;
  jobTtlMs: number;
  sweepIntervalMs: number;
  maxFileBytes: number;
  maxFiles: number;
  tmpDir: string;
  metricsPath: string;
  ocrLang: string;
  binaries: {
    soffice: string;
    pdftoppm: string;
    pdftotext: string;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset so `PORT=` falls back to the default.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    workerConcurrency: parsed.WORKER_CONCURRENCY,
    conversionTimeoutMs: parsed.CONVERSION_TIMEOUT_MS,
    archiveTtlMs: parsed.ARCHIVE_TTL_MS,
    jobTtlMs: parsed.JOB_TTL_MS,
    sweepIntervalMs: parsed.SWEEP_INTERVAL_MS,
    maxFileBytes: parsed.MAX_FILE_MB * 1024 * 1024,
    maxFiles: parsed.MAX_FILES,
    tmpDir: parsed.TMP_DIR,
    metricsPath: parsed.METRICS_PATH,
    ocrLang: parsed.OCR_LANG,
    binaries: {
      soffice: parsed.SOFFICE_BIN,
      pdftoppm: parsed.PDFTOPPM_BIN,
      pdftotext: parsed.PDFTOTEXT_BIN,
    },
  };
}
