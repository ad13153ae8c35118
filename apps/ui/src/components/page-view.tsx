import { Suspense, lazy } from 'react';
import type { DashboardPage, PageSection } from '@kpi-board/metrics';
import { THEME } from '../lib/theme.ts';
import { resolveActiveTab, useDashboardStore } from '../store/index.ts';
import { DataTable } from './data-table.tsx';
import { KpiRow } from './kpi-row.tsx';

const ChartPanel = lazy(async () => {
  const module = await import('./chart-panel.tsx');
  return { default: module.ChartPanel };
});

interface PageViewProps {
  page: DashboardPage;
}

function SectionView(props: { section: PageSection }) {
  switch (props.section.kind) {
    case 'kpis':
      return <KpiRow section={props.section} />;
    case 'chart':
      return (
        <Suspense fallback={<p style={{ color: THEME.muted }}>Loading chart...</p>}>
          <ChartPanel section={props.section} />
        </Suspense>
      );
    case 'table':
      return <DataTable section={props.section} />;
  }
}

export function PageView(props: PageViewProps) {
  const tabId = useDashboardStore((s) => s.activeTabByPage[props.page.id]);
  const setActiveTab = useDashboardStore((s) => s.setActiveTab);
  const activeTab = resolveActiveTab(props.page, tabId);

  return (
    <section>
      <header style={{ marginBottom: 16 }}>
        <h1 style={{ margin: 0, fontSize: 26 }}>{props.page.title}</h1>
        <p style={{ margin: '4px 0 0', color: THEME.muted }}>{props.page.subtitle}</p>
      </header>

      {props.page.tabs.length > 1 && (
        <div role="tablist" style={{ display: 'flex', gap: 8, marginBottom: 16 }}>
          {props.page.tabs.map((tab) => (
            <button
              key={tab.id}
              type="button"
              role="tab"
              aria-selected={tab.id === activeTab?.id}
              onClick={() => {
                setActiveTab(props.page.id, tab.id);
              }}
              style={{
                border: tab.id === activeTab?.id ? `2px solid ${THEME.accent}` : `1px solid ${THEME.border}`,
                background: tab.id === activeTab?.id ? '#1f2f46' : THEME.panelElevated,
              }}
            >
              {tab.label}
            </button>
          ))}
        </div>
      )}

      {activeTab && activeTab.sections.length === 0 && (
        <p style={{ color: THEME.muted }}>None of the metrics for this page were found in the prepared dataset.</p>
      )}
      <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(420px, 1fr))', gap: 16 }}>
        {activeTab?.sections.map((section) => (
          <div key={section.id} style={{ gridColumn: section.kind === 'chart' ? 'auto' : '1 / -1' }}>
            <SectionView section={section} />
          </div>
        ))}
      </div>
    </section>
  );
}
