import type { ChartColor } from '@kpi-board/metrics';

export const THEME = {
  bg: '#0c0d10',
  panel: '#191b20',
  panelElevated: '#1f232b',
  border: '#2a2f37',
  grid: '#293142',
  axis: '#374152',
  text: '#f8fafc',
  title: '#b4bac3',
  muted: '#8c949f',
  accent: '#96c5ff',
  danger: '#ff7d9f',
};

export const CHART_COLORS: Record<ChartColor, string> = {
  primary: '#96c5ff',
  secondary: '#cfadff',
  success: '#1dbf73',
  warning: '#ffbf75',
  danger: '#ff7d9f',
  dark: '#dbe7ff',
};

/** Slice colors for donut charts, cycled by index. */
export const SLICE_COLORS = ['#96c5ff', '#cfadff', '#1dbf73', '#ffbf75', '#ff7d9f', '#5ad1d1', '#dbe7ff'];

export const APP_CSS = `
.kpi-board button {
  border-radius: 8px;
  border: 1px solid #3a4452;
  background: #222830;
  color: #f8fafc;
  padding: 0.45rem 0.7rem;
  cursor: pointer;
}

.kpi-board table {
  color: #f8fafc;
  border-collapse: collapse;
  width: 100%;
}

.kpi-board th,
.kpi-board td {
  border-bottom: 1px solid #2a2f37;
  padding: 0.4rem 0.6rem;
  text-align: left;
}
`;
