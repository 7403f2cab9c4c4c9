/**
 * feedbackscan Executor — runs one batch, or reports that there is none
 *
 * The batch text is audited before it reaches the adapter. A non-empty batch
 * is executed exactly once; any failure fails the whole batch.
 */

import { z } from 'zod';
import type { BatchStatement, VolumeRow } from './types.js';
import type { CatalogAdapter } from './adapters/adapter.js';
import type { ScanLogger } from './logger.js';
import { mapSqlError } from './errors.js';
import { RESULT_COLUMNS } from './synthesizer.js';

export const NO_CANDIDATES_MESSAGE = 'No valid tables or columns found to search';

export type ExecutionOutcome =
  | { status: 'empty'; message: string }
  | { status: 'ok'; rows: VolumeRow[] };

/** Calendar date of a driver value, read in UTC. */
export function formatDate(value: Date | string): string {
  if (typeof value === 'string') return value.slice(0, 10);
  const y = String(value.getUTCFullYear()).padStart(4, '0');
  const m = String(value.getUTCMonth() + 1).padStart(2, '0');
  const d = String(value.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

const resultRowSchema = z.object({
  [RESULT_COLUMNS.tableName]: z.string(),
  [RESULT_COLUMNS.date]: z.union([z.date(), z.string()]),
  [RESULT_COLUMNS.volume]: z.union([z.number(), z.bigint(), z.string().regex(/^\d+$/)]),
}).transform((row): VolumeRow => ({
  tableName: row.TableName,
  date: formatDate(row.Date),
  volume: Number(row.Volume),
}));

export function normalizeRows(rows: ReadonlyArray<Record<string, unknown>>): VolumeRow[] {
  return rows.map(row => resultRowSchema.parse(row));
}

export async function executeBatch(
  adapter: CatalogAdapter,
  batch: BatchStatement,
  logger: ScanLogger,
): Promise<ExecutionOutcome> {
  if (batch.statements.length === 0 || batch.sql === '') {
    logger.logNoCandidates(batch, NO_CANDIDATES_MESSAGE);
    return { status: 'empty', message: NO_CANDIDATES_MESSAGE };
  }

  logger.logBatch(batch);

  const raw = await adapter.execute(batch.sql);
  try {
    return { status: 'ok', rows: normalizeRows(raw) };
  } catch (err) {
    throw mapSqlError(err, batch.dialect, 'execute');
  }
}
