import {
  Area,
  AreaChart,
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  Legend,
  Line,
  LineChart,
  Pie,
  PieChart,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import type { ChartSection } from '@kpi-board/metrics';
import { thresholdColor, toChartRows, toSliceData } from '../lib/chart-data.ts';
import { formatAxisValue, formatValue } from '../lib/format-utils.ts';
import { CHART_COLORS, SLICE_COLORS, THEME } from '../lib/theme.ts';

interface ChartPanelProps {
  section: ChartSection;
}

const TOOLTIP_STYLE = {
  backgroundColor: '#13171f',
  border: '1px solid #2b3344',
  borderRadius: 10,
  color: THEME.text,
};

const AXIS_PROPS = {
  axisLine: { stroke: THEME.axis },
  tickLine: { stroke: THEME.axis },
  tick: { fill: THEME.muted, fontSize: 12 },
};

function renderReferenceLine(section: ChartSection, axis: 'x' | 'y') {
  if (!section.referenceLine) {
    return null;
  }
  const { value, label, color } = section.referenceLine;
  const position = axis === 'y' ? { y: value } : { x: value };
  return (
    <ReferenceLine
      {...position}
      stroke={CHART_COLORS[color]}
      strokeDasharray="6 4"
      label={{ value: `${label}: ${formatValue(value, section.valueFormat)}`, fill: THEME.title, fontSize: 12, position: 'insideTopRight' }}
    />
  );
}

function renderChart(section: ChartSection) {
  const rows = toChartRows(section);
  const formatTooltip = (rawValue: unknown) => formatValue(typeof rawValue === 'number' ? rawValue : null, section.valueFormat);
  const formatTick = (rawValue: unknown) => (typeof rawValue === 'number' ? formatAxisValue(rawValue, section.valueFormat) : String(rawValue));
  const showLegend = section.series.length > 1;
  const threshold = section.threshold;

  switch (section.chartKind) {
    case 'line':
      return (
        <LineChart data={rows} margin={{ top: 10, right: 24, left: 8, bottom: 10 }} aria-label={section.title}>
          <CartesianGrid stroke={THEME.grid} strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="category" {...AXIS_PROPS} />
          <YAxis {...AXIS_PROPS} tickFormatter={formatTick} width={80} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelStyle={{ color: THEME.title }} formatter={formatTooltip} />
          {showLegend && <Legend />}
          {section.series.map((series) => (
            <Line
              key={series.key}
              type="monotone"
              dataKey={series.key}
              name={series.label}
              stroke={CHART_COLORS[series.color]}
              strokeWidth={2}
              dot={{ r: 3 }}
            />
          ))}
          {renderReferenceLine(section, 'y')}
        </LineChart>
      );
    case 'area':
      return (
        <AreaChart data={rows} margin={{ top: 10, right: 24, left: 8, bottom: 10 }} aria-label={section.title}>
          <CartesianGrid stroke={THEME.grid} strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="category" {...AXIS_PROPS} />
          <YAxis {...AXIS_PROPS} tickFormatter={formatTick} width={80} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelStyle={{ color: THEME.title }} formatter={formatTooltip} />
          {section.series.map((series) => (
            <Area
              key={series.key}
              type="monotone"
              dataKey={series.key}
              name={series.label}
              stroke={CHART_COLORS[series.color]}
              fill={CHART_COLORS[series.color]}
              fillOpacity={0.25}
            />
          ))}
        </AreaChart>
      );
    case 'bar':
    case 'groupedBar':
      return (
        <BarChart data={rows} margin={{ top: 10, right: 24, left: 8, bottom: 10 }} aria-label={section.title}>
          <CartesianGrid stroke={THEME.grid} strokeDasharray="3 3" vertical={false} />
          <XAxis dataKey="category" {...AXIS_PROPS} />
          <YAxis {...AXIS_PROPS} tickFormatter={formatTick} width={80} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelStyle={{ color: THEME.title }} formatter={formatTooltip} />
          {showLegend && <Legend />}
          {section.series.map((series) => (
            <Bar key={series.key} dataKey={series.key} name={series.label} fill={CHART_COLORS[series.color]}>
              {threshold !== undefined &&
                series.values.map((value, index) => (
                  <Cell key={`${series.key}-${index}`} fill={CHART_COLORS[thresholdColor(value, threshold)]} />
                ))}
            </Bar>
          ))}
          {renderReferenceLine(section, 'y')}
        </BarChart>
      );
    case 'horizontalBar':
      return (
        <BarChart data={rows} layout="vertical" margin={{ top: 10, right: 24, left: 8, bottom: 10 }} aria-label={section.title}>
          <CartesianGrid stroke={THEME.grid} strokeDasharray="3 3" horizontal={false} />
          <XAxis type="number" {...AXIS_PROPS} tickFormatter={formatTick} />
          <YAxis type="category" dataKey="category" {...AXIS_PROPS} width={170} />
          <Tooltip contentStyle={TOOLTIP_STYLE} labelStyle={{ color: THEME.title }} formatter={formatTooltip} />
          {section.series.map((series) => (
            <Bar key={series.key} dataKey={series.key} name={series.label} fill={CHART_COLORS[series.color]} />
          ))}
          {renderReferenceLine(section, 'x')}
        </BarChart>
      );
    case 'donut': {
      const slices = toSliceData(section);
      return (
        <PieChart aria-label={section.title}>
          <Tooltip contentStyle={TOOLTIP_STYLE} formatter={formatTooltip} />
          <Legend />
          <Pie data={slices} dataKey="value" nameKey="name" innerRadius="45%" outerRadius="80%" paddingAngle={1}>
            {slices.map((slice, index) => (
              <Cell key={slice.name} fill={SLICE_COLORS[index % SLICE_COLORS.length]} />
            ))}
          </Pie>
        </PieChart>
      );
    }
  }
}

export function ChartPanel(props: ChartPanelProps) {
  const hasValues = props.section.series.some((series) => series.values.some((value) => value !== null));

  return (
    <div
      style={{
        border: `1px solid ${THEME.border}`,
        borderRadius: 16,
        background: THEME.panelElevated,
        padding: 14,
      }}
    >
      <h3 style={{ marginTop: 0, color: THEME.title, fontSize: 15 }}>{props.section.title}</h3>
      {hasValues ? (
        <div style={{ height: 320 }}>
          <ResponsiveContainer width="100%" height="100%">
            {renderChart(props.section)}
          </ResponsiveContainer>
        </div>
      ) : (
        <p style={{ color: THEME.muted }}>No data available for this chart.</p>
      )}
    </div>
  );
}
