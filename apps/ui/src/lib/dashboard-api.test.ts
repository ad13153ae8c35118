import { describe, expect, it, vi } from 'vitest';
import { describeApiError, fetchPreparedDataset, type FetchResponse } from './dashboard-api.ts';

function respond(status: number, body: unknown): FetchResponse {
  return { ok: status < 400, status, json: async () => body };
}

const DATASET = {
  sourceFile: 'prepared.xlsx',
  loadedAt: '2026-01-01T00:00:00.000Z',
  observations: [
    {
      tableName: 'Indices_Condominios',
      metricName: 'CAC',
      period: { year: 2025, month: 1, label: 'Janeiro', date: '2025-01-01' },
      value: null,
    },
  ],
  tableSummaries: [],
};

describe('fetchPreparedDataset', () => {
  it('requests the dataset route and returns the validated value', async () => {
    const fetchImpl = vi.fn(async () => respond(200, { ok: true, value: DATASET }));

    const dataset = await fetchPreparedDataset(fetchImpl);

    expect(fetchImpl).toHaveBeenCalledWith('/api/dataset');
    expect(dataset.observations[0]?.value).toBeNull();
  });

  it('throws the server error with its hint', async () => {
    const fetchImpl = vi.fn(async () =>
      respond(404, {
        ok: false,
        error: {
          code: 'DASHBOARD_DATASET_NOT_FOUND',
          message: 'Prepared workbook not found: prepared.xlsx',
          severity: 'error',
          context: { hint: 'Run "npm run etl" to generate it first.' },
          timestamp: '2026-01-01T00:00:00.000Z',
        },
      }),
    );

    await expect(fetchPreparedDataset(fetchImpl)).rejects.toThrow(
      'Prepared workbook not found: prepared.xlsx Run "npm run etl" to generate it first.',
    );
  });

  it('rejects payloads that do not match the contract', async () => {
    const fetchImpl = vi.fn(async () => respond(200, { ok: true, value: { observations: 'none' } }));

    await expect(fetchPreparedDataset(fetchImpl)).rejects.toThrow('Dataset endpoint returned an unexpected payload (HTTP 200).');
  });

  it('rejects non-JSON responses', async () => {
    const fetchImpl = vi.fn(async (): Promise<FetchResponse> => ({
      ok: false,
      status: 502,
      json: async () => {
        throw new SyntaxError('Unexpected token <');
      },
    }));

    await expect(fetchPreparedDataset(fetchImpl)).rejects.toThrow('Dataset endpoint returned a non-JSON response (HTTP 502).');
  });
});

describe('describeApiError', () => {
  it('uses the message alone when there is no hint', () => {
    expect(
      describeApiError({
        code: 'DASHBOARD_DATASET_INVALID',
        message: 'Row 2 of "Consolidated_Long" is invalid.',
        severity: 'error',
        timestamp: '2026-01-01T00:00:00.000Z',
      }),
    ).toBe('Row 2 of "Consolidated_Long" is invalid.');
  });
});
