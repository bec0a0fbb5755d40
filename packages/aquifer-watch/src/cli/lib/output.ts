/**
 * Output Formatting for CLI Commands
 *
 * Renders the run manifest as an aligned text table or as JSON.
 *
 * @module cli/lib/output
 */

import { summarizeManifest, type RunManifest } from '../../pipeline/manifest.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right' | 'center';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cell = (row: T, col: TableColumn): string => {
    const value = row[col.key];
    return col.formatter ? col.formatter(value) : String(value ?? '');
  };

  // Calculate column widths
  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cell(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const renderRow = (values: readonly string[]): string =>
    values
      .map((value, i) => padCell(value, widths[i] ?? value.length, columns[i]?.align ?? 'left'))
      .join(' | ');

  const headerRow = renderRow(columns.map((col) => col.header));
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) => renderRow(columns.map((col) => cell(row, col))));

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right' | 'center'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;

  switch (align) {
    case 'right':
      return truncated.padStart(width);
    case 'center': {
      const padding = width - truncated.length;
      const leftPad = Math.floor(padding / 2);
      return ' '.repeat(leftPad) + truncated + ' '.repeat(padding - leftPad);
    }
    default:
      return truncated.padEnd(width);
  }
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

// ============================================================================
// Manifest
// ============================================================================

const MANIFEST_COLUMNS: readonly TableColumn[] = [
  { key: 'unit', header: 'Unit' },
  { key: 'status', header: 'Status' },
  { key: 'detail', header: 'Detail', width: 72 },
];

interface ManifestRow extends Record<string, unknown> {
  readonly unit: string;
  readonly status: string;
  readonly detail: string;
}

export function manifestRows(manifest: RunManifest): ManifestRow[] {
  return Object.entries(manifest.entries).map(([unit, outcome]) => {
    if (outcome.status === 'failure') {
      return { unit, status: 'FAILED', detail: `${outcome.kind}: ${outcome.message}` };
    }
    if (outcome.noData) {
      return { unit, status: 'ok', detail: 'no data' };
    }
    const count = outcome.artifacts.length;
    return {
      unit,
      status: 'ok',
      detail: count === 0 ? '' : `${count} artifact${count === 1 ? '' : 's'}`,
    };
  });
}

/**
 * One-line totals, plus the fatal error when there is one
 */
export function formatSummary(manifest: RunManifest): string {
  const summary = summarizeManifest(manifest);
  const lines = [
    `${summary.succeeded}/${summary.total} units succeeded, ${summary.failed} failed, ` +
      `${summary.noData} without data, ${summary.artifacts} artifacts written`,
  ];
  if (manifest.fatal) {
    lines.push(
      `FATAL in ${manifest.fatal.step}: ${manifest.fatal.kind}: ${manifest.fatal.message}`
    );
  }
  return lines.join('\n');
}

export function formatManifest(manifest: RunManifest, json: boolean): string {
  if (json) {
    return formatJson(manifest);
  }
  return `${formatTable(manifestRows(manifest), MANIFEST_COLUMNS)}\n\n${formatSummary(manifest)}`;
}
