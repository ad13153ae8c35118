import type { TableSection } from '@kpi-board/metrics';
import { formatValue } from '../lib/format-utils.ts';
import { THEME } from '../lib/theme.ts';

interface DataTableProps {
  section: TableSection;
}

export function DataTable(props: DataTableProps) {
  return (
    <div
      style={{
        border: `1px solid ${THEME.border}`,
        borderRadius: 16,
        background: THEME.panelElevated,
        padding: 14,
        overflowX: 'auto',
      }}
    >
      <h3 style={{ marginTop: 0, color: THEME.title, fontSize: 15 }}>{props.section.title}</h3>
      <table>
        <thead>
          <tr>
            {props.section.columns.map((column) => (
              <th key={column} style={{ color: THEME.title }}>
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {props.section.rows.map((row, rowIndex) => (
            <tr key={`row-${rowIndex}`}>
              {row.map((cell, cellIndex) => (
                <td key={`cell-${rowIndex}-${cellIndex}`} style={{ textAlign: typeof cell.value === 'number' ? 'right' : 'left' }}>
                  {formatValue(cell.value, cell.format)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
