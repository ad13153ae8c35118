import type { SeriesTables } from './dataset-builder.ts';

/** Three months of made-up values covering gaps, zero totals and fractions. */
export const SAMPLE_SERIES: SeriesTables = {
  Marketing_Geral: {
    'Novos Seguidores': [100, 120, null],
    Visualizações: [1000, 2000, 3000],
    'Alcance Orgânico': [500, 600, 700],
    'Alcance Pago': [200, null, 400],
    'Custo geral de Ads': [1000, 1500, 2000],
  },
  Leads_Condominios: {
    'Origem da proposta enviada - Indicação': [10, 10, 0],
    'Origem da proposta enviada - Reativação': [0, 0, 0],
    'Origem da proposta enviada - Ads': [5, null, 5],
    'Lead Convertido - Indicação': [5, 4, 1],
    'Lead Convertido - Reativação': [0, 0, 0],
    'Lead Convertido - Ads': [1, 1, 0],
  },
  Indices_Condominios: {
    CAC: [30, null, 18],
    MRR: [40000, 50000, 60000],
    'Recorrente mensal / Custo': [0.8, 1.2, 1.5],
  },
  Campanha_Imoveis: {
    Investimento: [2000, 3000, null],
    'Leads Gerados': [40, 60, null],
    'Clientes Convertidos': [4, 6, null],
    ROI: [3, 4, null],
  },
  Campanha_Boleto_Digital: {
    'Nº de Unidades cadastradas': [300, 320, 340],
    Economia: [100, 200, 300],
    '% da base': [0.1, 0.2, 0.25],
  },
  Campanha_Multiseguros: {
    Investimento: [1000, 1000, 1000],
    'Leads Gerados': [0, 0, 0],
    'Clientes Convertidos': [null, null, null],
    ROI: [2, 2, 2],
  },
};
