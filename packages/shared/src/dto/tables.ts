/** Tables of the prepared dataset, in sheet order. */
export const TABLE_NAMES = [
  'Marketing_Geral',
  'Leads_Condominios',
  'Indices_Condominios',
  'Campanha_Imoveis',
  'Campanha_Boleto_Digital',
  'Campanha_Multiseguros',
] as const;

export type TableName = (typeof TABLE_NAMES)[number];
