/**
 * Plain-text rendering of a report, tab-separated.
 */

import type { ScanReport } from './types.js';

export function formatReport(report: ScanReport): string[] {
  if (report.status === 'empty') return [report.message];

  const lines = [`TableName\tDate\tVolume`];
  for (const row of report.rows) {
    lines.push(`${row.tableName}\t${row.date}\t${row.volume}`);
  }
  lines.push(`(${report.rows.length} rows from ${report.receipt.statements} statements in ${report.receipt.duration}ms)`);
  return lines;
}
