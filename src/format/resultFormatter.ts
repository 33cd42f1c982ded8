/**
 * Result formatting: bordered table, JSON, or CSV
 */

import { unparse } from 'papaparse';
import type { CellValue, ResultTable } from '../reports/types.js';

export const OUTPUT_MODES = ['table', 'json', 'csv'] as const;

export type OutputMode = (typeof OUTPUT_MODES)[number];

export function isOutputMode(value: string): value is OutputMode {
  return (OUTPUT_MODES as readonly string[]).includes(value);
}

function renderCell(value: CellValue | undefined): string {
  return value === undefined ? '' : String(value);
}

function formatTable(table: ResultTable): string {
  const { columns, rows } = table;
  const cells = rows.map((row) => columns.map((column) => renderCell(row[column])));

  const widths = columns.map((header, i) =>
    cells.reduce((max, line) => Math.max(max, line[i].length), header.length)
  );

  const separator = '+' + widths.map((w) => '-'.repeat(w + 2)).join('+') + '+';
  const renderLine = (values: string[]) =>
    '|' + values.map((v, i) => ` ${v.padEnd(widths[i])} `).join('|') + '|';

  const lines = [separator, renderLine(columns), separator];
  for (const line of cells) {
    lines.push(renderLine(line));
  }
  lines.push(separator);

  if (table.rowCount) {
    lines.push('', `Total rows: ${table.rowCount}`);
  }

  return lines.join('\n');
}

function formatJson(table: ResultTable): string {
  // rebuild each row so keys follow column order
  const rows = table.rows.map((row) =>
    Object.fromEntries(table.columns.map((column) => [column, row[column] ?? null]))
  );
  return JSON.stringify(rows, null, 2);
}

function formatCsv(table: ResultTable): string {
  // header as the first data row: no trailing newline when there are no rows
  const data = table.rows.map((row) => table.columns.map((column) => renderCell(row[column])));
  return unparse([table.columns, ...data], { newline: '\n' });
}

export function formatResult(table: ResultTable, mode: OutputMode): string {
  switch (mode) {
    case 'json':
      return formatJson(table);
    case 'csv':
      return formatCsv(table);
    case 'table':
      return formatTable(table);
  }
}
