import { z } from 'zod/v4';
import { AppErrorSchema, type AppErrorDTO } from '../errors/app-error.ts';
import { PreparedDatasetDTOSchema } from '../dto/dataset.ts';

export interface ApiOk<T> {
  ok: true;
  value: T;
}

export interface ApiErr {
  ok: false;
  error: AppErrorDTO;
}

export type ApiResult<T> = ApiOk<T> | ApiErr;

export const ApiResultSchema = <T extends z.ZodType>(dataSchema: T) =>
  z.union([
    z.object({ ok: z.literal(true), value: dataSchema }),
    z.object({ ok: z.literal(false), error: AppErrorSchema }),
  ]);

export const PreparedDatasetResultSchema = ApiResultSchema(PreparedDatasetDTOSchema);
export type PreparedDatasetResult = z.infer<typeof PreparedDatasetResultSchema>;

export const API_ROUTES = {
  dataset: '/api/dataset',
} as const;

export type ApiRoute = (typeof API_ROUTES)[keyof typeof API_ROUTES];
