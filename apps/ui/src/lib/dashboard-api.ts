import { API_ROUTES, PreparedDatasetResultSchema, type AppErrorDTO, type PreparedDatasetDTO } from '@kpi-board/shared';

export interface FetchResponse {
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}

export type FetchLike = (url: string) => Promise<FetchResponse>;

export function describeApiError(error: AppErrorDTO): string {
  const hint = error.context?.hint;
  return typeof hint === 'string' ? `${error.message} ${hint}` : error.message;
}

export async function fetchPreparedDataset(fetchImpl: FetchLike = (url) => fetch(url)): Promise<PreparedDatasetDTO> {
  const response = await fetchImpl(API_ROUTES.dataset);
  let payload: unknown;
  try {
    payload = await response.json();
  } catch (cause) {
    throw new Error(`Dataset endpoint returned a non-JSON response (HTTP ${response.status}).`, { cause });
  }

  const parsed = PreparedDatasetResultSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Dataset endpoint returned an unexpected payload (HTTP ${response.status}).`);
  }
  if (!parsed.data.ok) {
    throw new Error(describeApiError(parsed.data.error));
  }
  return parsed.data.value;
}
