import type { DashboardOverview, DashboardPage, DashboardPageId } from '@kpi-board/metrics';
import { formatCompleteness, formatValue, MISSING_LABEL } from '../lib/format-utils.ts';
import { THEME } from '../lib/theme.ts';

interface SidebarProps {
  pages: DashboardPage[];
  activePageId: DashboardPageId;
  overview: DashboardOverview;
  sourceFile: string;
  onSelectPage: (pageId: DashboardPageId) => void;
  onReload: () => void;
}

function OverviewLine(props: { label: string; value: string }) {
  return (
    <div style={{ display: 'flex', justifyContent: 'space-between', gap: 8, fontSize: 13 }}>
      <span style={{ color: THEME.muted }}>{props.label}</span>
      <strong>{props.value}</strong>
    </div>
  );
}

export function Sidebar(props: SidebarProps) {
  return (
    <aside
      style={{
        width: 260,
        flexShrink: 0,
        padding: 16,
        borderRight: `1px solid ${THEME.border}`,
        background: THEME.panel,
        display: 'flex',
        flexDirection: 'column',
        gap: 16,
      }}
    >
      <h2 style={{ margin: 0, fontSize: 18 }}>Marketing KPI Board</h2>

      <nav style={{ display: 'flex', flexDirection: 'column', gap: 6 }}>
        {props.pages.map((page) => (
          <button
            key={page.id}
            type="button"
            onClick={() => {
              props.onSelectPage(page.id);
            }}
            style={{
              textAlign: 'left',
              border: page.id === props.activePageId ? `2px solid ${THEME.accent}` : `1px solid ${THEME.border}`,
              background: page.id === props.activePageId ? '#1f2f46' : THEME.panelElevated,
            }}
          >
            {page.title}
          </button>
        ))}
      </nav>

      <div style={{ display: 'flex', flexDirection: 'column', gap: 6 }}>
        <h3 style={{ margin: 0, fontSize: 14, color: THEME.title }}>Overview</h3>
        <OverviewLine label="Total metrics" value={formatValue(props.overview.totalMetrics, 'integer')} />
        <OverviewLine label="Tables" value={formatValue(props.overview.tableCount, 'integer')} />
        <OverviewLine label="Completeness" value={formatCompleteness(props.overview.averageCompletenessPct)} />
        <OverviewLine label="Period" value={props.overview.reportingWindow ?? MISSING_LABEL} />
      </div>

      <div style={{ marginTop: 'auto', fontSize: 12, color: THEME.muted }}>
        <p style={{ margin: '0 0 8px' }}>Source: {props.sourceFile}</p>
        <button type="button" onClick={props.onReload}>
          Reload data
        </button>
      </div>
    </aside>
  );
}
