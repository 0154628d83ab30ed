/**
 * Markdown rendering of aggregated benchmark rows
 */

import type { SummaryRecord } from './types.js';

export const TABLE_HEADERS = [
  'Model',
  'Hardware',
  'Chunk',
  'Batch',
  'Conc',
  'p50 (ms)',
  'p99 (ms)',
  'Tput (emb/s)',
  'Tput/User',
  'Power (W)',
  'Emb/Joule',
];

function optional(value: number | null, decimals: number): string {
  return value === null ? '-' : value.toFixed(decimals);
}

export function toTableRow(record: SummaryRecord): string[] {
  return [
    record.model.split('/').pop() ?? record.model,
    record.hardware,
    String(record.chunk_size),
    String(record.batch_size),
    String(record.concurrency),
    record.p50_latency_ms.toFixed(1),
    record.p99_latency_ms.toFixed(1),
    record.throughput_emb_per_sec.toFixed(1),
    record.throughput_per_user.toFixed(1),
    optional(record.power_avg_w, 1),
    optional(record.emb_per_joule, 2),
  ];
}

export function renderMarkdownTable(records: readonly SummaryRecord[]): string {
  const rows = records.map(toTableRow);
  const widths = TABLE_HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map(row => row[column].length))
  );

  const formatRow = (cells: string[]) =>
    '| ' + cells.map((cell, column) => cell.padEnd(widths[column])).join(' | ') + ' |';
  const separator = '|-' + widths.map(width => '-'.repeat(width)).join('-|-') + '-|';

  return [formatRow(TABLE_HEADERS), separator, ...rows.map(formatRow)].join('\n');
}
