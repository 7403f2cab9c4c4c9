/**
 * feedbackscan Catalog Adapter Interface
 *
 * The database side of the pipeline: the catalog read and the dynamic
 * execution of one batch. FeedbackScan delegates both to the adapter.
 */

import type {
  ColumnDescriptor,
  ConnectionStatus,
  SqlDialect,
} from '../types.js';

export interface CatalogAdapter {
  readonly dialect: SqlDialect;

  // ─── Lifecycle ────────────────────────────────────────────────────
  connect(): Promise<void>;
  close(): Promise<void>;
  status(): ConnectionStatus;

  // ─── Catalog ──────────────────────────────────────────────────────
  listColumns(): Promise<ColumnDescriptor[]>;

  // ─── Execution ────────────────────────────────────────────────────
  /** Run one parameterless batch. Rows are returned as the driver produced them. */
  execute(batchSql: string): Promise<Array<Record<string, unknown>>>;
}
