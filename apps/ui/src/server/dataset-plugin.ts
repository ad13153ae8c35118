import { API_ROUTES, type AppError, type Logger, type PreparedDatasetDTO, type PreparedDatasetResult } from '@kpi-board/shared';
import { createPreparedDatasetCache, type PreparedDatasetCache } from '@kpi-board/metrics/node';
import type { Plugin } from 'vite';

export interface DatasetRequest {
  method?: string;
}

export interface DatasetResponse {
  statusCode: number;
  setHeader: (name: string, value: string) => unknown;
  end: (body: string) => unknown;
}

export interface DatasetApiPluginOptions {
  preparedPath: string;
  logger: Logger;
}

function statusForError(error: AppError): number {
  return error.code === 'DASHBOARD_DATASET_NOT_FOUND' ? 404 : 500;
}

function sendJson(res: DatasetResponse, statusCode: number, body: PreparedDatasetResult): void {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(body));
}

/**
 * Serves the prepared dataset as an API result envelope. Read-only: any method
 * other than GET is rejected.
 */
export function createDatasetRequestHandler(cache: PreparedDatasetCache, logger: Logger) {
  return async (req: DatasetRequest, res: DatasetResponse): Promise<void> => {
    if (req.method !== undefined && req.method !== 'GET') {
      res.statusCode = 405;
      res.setHeader('Allow', 'GET');
      res.end('');
      return;
    }

    const result = await cache.get();
    if (!result.ok) {
      logger.error('Prepared dataset unavailable.', { error: result.error.toDTO() });
      sendJson(res, statusForError(result.error), { ok: false, error: result.error.toDTO() });
      return;
    }

    const dataset: PreparedDatasetDTO = result.value;
    logger.debug('Prepared dataset served.', { observations: dataset.observations.length });
    sendJson(res, 200, { ok: true, value: dataset });
  };
}

export function datasetApiPlugin(options: DatasetApiPluginOptions): Plugin {
  const cache = createPreparedDatasetCache({ filePath: options.preparedPath });
  const handle = createDatasetRequestHandler(cache, options.logger);

  return {
    name: 'kpi-board-dataset-api',
    configureServer(server) {
      server.middlewares.use(API_ROUTES.dataset, (req, res, next) => {
        handle(req, res).catch(next);
      });
      options.logger.info('Dataset API mounted.', { route: API_ROUTES.dataset, preparedPath: options.preparedPath });
    },
  };
}
