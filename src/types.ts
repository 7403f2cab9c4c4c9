/**
 * feedbackscan — All shared types and interfaces
 *
 * This is the ONLY file every other file imports.
 * No circular dependencies. No file imports from an adapter.
 */

// ─── Dialect ─────────────────────────────────────────────────────────────────

/** Each dialect is served by the npm driver of the same name. */
export type SqlDialect = 'mssql' | 'pg' | 'mysql2';

// ─── Catalog Model ───────────────────────────────────────────────────────────

export interface ColumnDescriptor {
  readonly schemaName: string;
  readonly tableName: string;
  readonly columnName: string;
  readonly dataType: string;
}

export interface CandidateTuple {
  readonly schemaName: string;
  readonly tableName: string;
  readonly textColumn: string;
  readonly temporalColumn: string;
}

// ─── Synthesis ───────────────────────────────────────────────────────────────

export interface GeneratedStatement {
  tuple: CandidateTuple;
  sql: string;
}

export interface BatchStatement {
  dialect: SqlDialect;
  /** Final batch text. Empty string when there are no candidates. */
  sql: string;
  statements: GeneratedStatement[];
  combinator: string;
}

// ─── Keywords ────────────────────────────────────────────────────────────────

export interface KeywordConfig {
  /** Name fragments marking a free-text feedback column. */
  text?: string[];
  /** Name fragments marking a date/time column. */
  temporal?: string[];
  /** Catalog type names a temporal column must have (exact match). */
  temporalTypes?: string[];
  /** Restrict the scan to these schemas. Empty means all. */
  schemas?: string[];
}

export interface ResolvedKeywords {
  text: ReadonlySet<string>;
  temporal: ReadonlySet<string>;
  temporalTypes: ReadonlySet<string>;
  schemas: ReadonlySet<string>;
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface VolumeRow {
  tableName: string;
  /** Calendar date, YYYY-MM-DD. */
  date: string;
  volume: number;
}

export interface RunReceipt {
  dialect: SqlDialect;
  columnsScanned: number;
  tuples: number;
  statements: number;
  rows: number;
  duration: number;
  executed: boolean;
}

export type ScanReport =
  | { status: 'empty'; message: string; batch: BatchStatement; receipt: RunReceipt }
  | { status: 'ok'; rows: VolumeRow[]; batch: BatchStatement; receipt: RunReceipt };

// ─── Connection Config ───────────────────────────────────────────────────────

export interface FeedbackScanConfig {
  uri: string;
  dialect?: SqlDialect;
  label?: string;
  keywords?: KeywordConfig;
  logging?: boolean | 'verbose';
  slowQueryMs?: number;
  requestTimeoutMs?: number;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type ScanErrorCode =
  | 'CONFIG_ERROR'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'PERMISSION_DENIED'
  | 'TABLE_NOT_FOUND'
  | 'CONVERSION_FAILED'
  | 'QUERY_ERROR'
  | 'IDENTIFIER_ERROR'
  | 'SYNTHESIS_ERROR'
  | 'INTERNAL_ERROR';

export type ScanStage = 'config' | 'connect' | 'scan' | 'synthesize' | 'execute';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface ScanEvents {
  connected: { dialect: SqlDialect; dbName: string; label: string };
  catalog: { dialect: SqlDialect; columns: number; tuples: number };
  batch: { dialect: SqlDialect; sql: string; statements: number };
  'no-candidates': { dialect: SqlDialect; message: string };
  run: { dialect: SqlDialect; durationMs: number; receipt: RunReceipt };
  'slow-run': { dialect: SqlDialect; durationMs: number; threshold: number };
  error: { code: ScanErrorCode; message: string; fix: string; dialect: SqlDialect; stage: ScanStage };
  closed: { dialect: SqlDialect };
}

// ─── Connection Status ───────────────────────────────────────────────────────

export interface ConnectionStatus {
  state: 'connected' | 'disconnected' | 'closed';
  dialect: SqlDialect;
  uri: string;
  dbName: string;
  uptimeMs: number;
}
