import chalk from 'chalk';

import type { ToolOutput } from '../core/types.js';

function padRight(text: string, width: number): string {
  if (text.length >= width) return text;
  return text + ' '.repeat(width - text.length);
}

function stringifyCell(value: string | number | null): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  return value;
}

function renderTable(columns: string[], rawRows: Array<Array<string | number | null>>): string[] {
  const rows = rawRows.map((row) => row.map(stringifyCell));
  const last = columns.length - 1;
  const widths = columns.map((column, index) => {
    const maxCell = Math.max(column.length, ...rows.map((row) => (row[index] ?? '').length));
    return Math.min(maxCell, 80);
  });

  // the last column is neither padded nor cut, so long command lines survive
  const cell = (text: string, i: number) => (i === last ? text : padRight(text.slice(0, widths[i]), widths[i]));

  const lines = [columns.map(cell).join('  ').trimEnd()];
  lines.push(widths.map((w) => '-'.repeat(w)).join('  '));
  for (const row of rows) {
    lines.push(row.map(cell).join('  ').trimEnd());
  }
  return lines;
}

export function renderOutputs(outputs: ToolOutput[], paint = chalk): string {
  const lines: string[] = [];

  for (const output of outputs) {
    if (output.kind === 'error') {
      lines.push(paint.red(output.message));
      continue;
    }

    if (output.kind === 'status') {
      lines.push(paint.dim(`${output.command}: exited with status ${output.code}`));
      continue;
    }

    if (output.kind === 'text') {
      if (output.title) lines.push(paint.bold(output.title));
      lines.push(output.text);
      continue;
    }

    if (output.kind === 'table') {
      if (output.title) lines.push(paint.bold(output.title));
      lines.push(...renderTable(output.columns, output.rows));
      continue;
    }
  }

  return lines.join('\n');
}
