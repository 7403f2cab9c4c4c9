/**
 * feedbackscan Run Receipts — what a report run did
 *
 * Every run returns a RunReceipt, whether or not a batch was executed.
 */

import type { RunReceipt, SqlDialect } from './types.js';

export function createReceipt(opts: {
  dialect: SqlDialect;
  startTime: number;
  columnsScanned?: number;
  tuples?: number;
  statements?: number;
  rows?: number;
  executed?: boolean;
}): RunReceipt {
  return {
    dialect: opts.dialect,
    columnsScanned: opts.columnsScanned ?? 0,
    tuples: opts.tuples ?? 0,
    statements: opts.statements ?? 0,
    rows: opts.rows ?? 0,
    duration: Date.now() - opts.startTime,
    executed: opts.executed ?? false,
  };
}
