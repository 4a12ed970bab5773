import type { Cell, Row } from '@sector-report/schemas';

export function formatCell(value: Cell | undefined): string {
  if (value === null || value === undefined) return 'None';
  return String(value);
}

/** Fixed-width text rendering, one line per row, columns right-aligned, no index column. */
export function renderTable(columns: string[], rows: readonly Row[]): string {
  const cells = rows.map((row) => columns.map((c) => formatCell(row[c])));
  const widths = columns.map((c, i) => Math.max(c.length, ...cells.map((line) => line[i].length)));
  const format = (values: string[]) => values.map((v, i) => v.padStart(widths[i])).join(' ');
  return [format(columns), ...cells.map(format)].join('\n');
}
