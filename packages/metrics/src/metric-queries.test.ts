import { describe, expect, it } from 'vitest';
import { buildDatasetFromSeries } from './fixtures/dataset-builder.ts';
import { SAMPLE_SERIES } from './fixtures/sample-series.ts';
import { createMetricQueries } from './metric-queries.ts';

const queries = createMetricQueries(buildDatasetFromSeries(SAMPLE_SERIES));

describe('createMetricQueries', () => {
  it('lists tables and metrics in dataset order', () => {
    expect(queries.listTables()).toEqual([
      'Marketing_Geral',
      'Leads_Condominios',
      'Indices_Condominios',
      'Campanha_Imoveis',
      'Campanha_Boleto_Digital',
      'Campanha_Multiseguros',
    ]);
    expect(queries.listMetrics('Indices_Condominios')).toEqual(['CAC', 'MRR', 'Recorrente mensal / Custo']);
    expect(queries.listMetrics('Unknown')).toEqual([]);
  });

  it('finds the first metric containing the pattern, ignoring case', () => {
    const series = queries.findSeries('Marketing_Geral', 'seguidores');

    expect(series?.metricName).toBe('Novos Seguidores');
    expect(series?.points.map((point) => [point.period.label, point.value])).toEqual([
      ['Janeiro', 100],
      ['Fevereiro', 120],
      ['Março', null],
    ]);
  });

  it('returns null for an unknown table or metric', () => {
    expect(queries.findSeries('Marketing_Geral', 'Receita')).toBeNull();
    expect(queries.findSeries('Vendas', 'CAC')).toBeNull();
  });

  it('finds every matching metric', () => {
    expect(queries.findAllSeries('Leads_Condominios', 'Lead Convertido').map((series) => series.metricName)).toEqual([
      'Lead Convertido - Indicação',
      'Lead Convertido - Reativação',
      'Lead Convertido - Ads',
    ]);
  });

  it('orders points by period regardless of observation order', () => {
    const dataset = buildDatasetFromSeries({ T: { M: [1, 2] } });
    const reversed = createMetricQueries({ ...dataset, observations: [...dataset.observations].reverse() });

    expect(reversed.findSeries('T', 'M')?.points.map((point) => point.value)).toEqual([1, 2]);
  });

  it('reports the window of periods holding data', () => {
    const reporting = createMetricQueries(buildDatasetFromSeries({ T: { M: [null, 5, 7, null] } })).reportingWindow();

    expect(reporting?.first.label).toBe('Fevereiro');
    expect(reporting?.last.label).toBe('Março');
  });

  it('has no reporting window without values', () => {
    expect(createMetricQueries(buildDatasetFromSeries({ T: { M: [null] } })).reportingWindow()).toBeNull();
  });
});
