import type { KpiSection } from '@kpi-board/metrics';
import { formatValue } from '../lib/format-utils.ts';
import { THEME } from '../lib/theme.ts';

interface KpiRowProps {
  section: KpiSection;
}

export function KpiRow(props: KpiRowProps) {
  return (
    <div>
      {props.section.title && <h3 style={{ marginTop: 0, color: THEME.title, fontSize: 15 }}>{props.section.title}</h3>}
      <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(200px, 1fr))', gap: 12 }}>
        {props.section.items.map((item) => (
          <article
            key={item.label}
            title={item.help}
            style={{
              background: THEME.panelElevated,
              border: `1px solid ${THEME.border}`,
              borderRadius: 16,
              padding: 14,
            }}
          >
            <p style={{ margin: 0, color: THEME.title, fontSize: 13 }}>{item.label}</p>
            <p
              style={{
                margin: '10px 0 0',
                fontSize: 26,
                fontWeight: 700,
                color: item.value === null ? THEME.muted : THEME.text,
              }}
            >
              {formatValue(item.value, item.format)}
            </p>
          </article>
        ))}
      </div>
    </div>
  );
}
