import path from 'node:path';
import { z } from 'zod/v4';
import { AppError } from '../errors/app-error.ts';
import {
  LOG_FORMATS,
  LOG_LEVELS,
  createJsonWriter,
  createLogger,
  createTextWriter,
  type LogContext,
  type LogFormat,
  type LogLevel,
  type LogSink,
  type Logger,
} from '../logger/index.ts';
import { err, ok, type Result } from '../types/result.ts';

export const DEFAULT_SOURCE_FILE = 'KPI - 2025 BAP.xlsx';
export const DEFAULT_PREPARED_FILE = 'KPI_Marketing_Preparado.xlsx';
export const DEFAULT_REPORT_YEAR = 2025;

const RuntimeEnvSchema = z.object({
  KPI_SOURCE_PATH: z.string().optional(),
  KPI_PREPARED_PATH: z.string().optional(),
  KPI_REPORT_YEAR: z.coerce.number().int().min(1900).max(2999).optional(),
  KPI_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  KPI_LOG_FORMAT: z.enum(LOG_FORMATS).optional(),
});

export type RuntimeEnv = Record<string, string | undefined>;

export interface RuntimeConfig {
  sourcePath: string;
  preparedPath: string;
  reportYear: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

function resolvePathFromEnv(value: string | undefined, fallbackPath: string, cwd: string): string {
  const candidate = value ?? fallbackPath;
  if (path.isAbsolute(candidate)) {
    return candidate;
  }
  return path.join(cwd, candidate);
}

function dropBlankValues(env: RuntimeEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function resolveRuntimeConfig(env: RuntimeEnv, cwd: string): Result<RuntimeConfig, AppError> {
  const parsed = RuntimeEnvSchema.safeParse(dropBlankValues(env));
  if (!parsed.success) {
    return err(
      AppError.create(
        'CONFIG_INVALID',
        'Environment configuration is invalid.',
        'fatal',
        { issues: parsed.error.issues.map((issue) => ({ path: issue.path.map(String).join('.'), message: issue.message })) },
      ),
    );
  }

  return ok({
    sourcePath: resolvePathFromEnv(parsed.data.KPI_SOURCE_PATH, DEFAULT_SOURCE_FILE, cwd),
    preparedPath: resolvePathFromEnv(parsed.data.KPI_PREPARED_PATH, DEFAULT_PREPARED_FILE, cwd),
    reportYear: parsed.data.KPI_REPORT_YEAR ?? DEFAULT_REPORT_YEAR,
    logLevel: parsed.data.KPI_LOG_LEVEL ?? 'info',
    logFormat: parsed.data.KPI_LOG_FORMAT ?? 'text',
  });
}

export function createRuntimeLogger(
  config: Pick<RuntimeConfig, 'logLevel' | 'logFormat'>,
  baseContext: LogContext,
  sink: LogSink = process.stdout,
): Logger {
  return createLogger({
    baseContext,
    minLevel: config.logLevel,
    writer: config.logFormat === 'json' ? createJsonWriter(sink) : createTextWriter(sink),
  });
}
