import fs from 'node:fs';
import { ok, type AppError, type PreparedDatasetDTO, type Result } from '@kpi-board/shared';
import { loadPreparedDataset } from './dataset-loader.ts';

export type PreparedDatasetLoader = (filePath: string) => Promise<Result<PreparedDatasetDTO, AppError>>;

export interface PreparedDatasetCacheOptions {
  filePath: string;
  load?: PreparedDatasetLoader;
  /** Modification time in ms, or null when the file cannot be inspected. */
  readMtime?: (filePath: string) => number | null;
}

export interface PreparedDatasetCache {
  get: () => Promise<Result<PreparedDatasetDTO, AppError>>;
  invalidate: () => void;
}

function readFileMtime(filePath: string): number | null {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Keeps the last successful load and serves it until the workbook's
 * modification time changes. Failures are never cached.
 */
export function createPreparedDatasetCache(options: PreparedDatasetCacheOptions): PreparedDatasetCache {
  const load = options.load ?? ((filePath: string) => loadPreparedDataset(filePath));
  const readMtime = options.readMtime ?? readFileMtime;
  let cached: { mtime: number; dataset: PreparedDatasetDTO } | null = null;

  return {
    get: async () => {
      const mtime = readMtime(options.filePath);
      if (cached && mtime !== null && cached.mtime === mtime) {
        return ok(cached.dataset);
      }

      cached = null;
      const result = await load(options.filePath);
      if (result.ok && mtime !== null) {
        cached = { mtime, dataset: result.value };
      }
      return result;
    },
    invalidate: () => {
      cached = null;
    },
  };
}
