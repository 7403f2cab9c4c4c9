/**
 * feedbackscan Error System — Normalized errors with fix instructions
 *
 * Every driver, configuration and synthesis failure is normalized into a
 * ScanError carrying the stage it happened in and a readable fix.
 */

import type { ScanErrorCode, ScanStage, SqlDialect } from './types.js';

// ─── ScanError ───────────────────────────────────────────────────────────────

export class ScanError extends Error {
  readonly code: ScanErrorCode;
  readonly dialect: SqlDialect;
  readonly stage: ScanStage;
  readonly originalError: unknown;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: ScanErrorCode;
    message: string;
    fix: string;
    dialect: SqlDialect;
    stage: ScanStage;
    originalError?: unknown;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'ScanError';
    this.code = opts.code;
    this.dialect = opts.dialect;
    this.stage = opts.stage;
    this.originalError = opts.originalError;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<ScanErrorCode, boolean> = {
  CONFIG_ERROR: false,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  PERMISSION_DENIED: false,
  TABLE_NOT_FOUND: false,
  CONVERSION_FAILED: false,
  QUERY_ERROR: false,
  IDENTIFIER_ERROR: false,
  SYNTHESIS_ERROR: false,
  INTERNAL_ERROR: false,
};

const FIXES: Record<ScanErrorCode, string> = {
  CONFIG_ERROR: 'Correct the configuration values listed above.',
  CONNECTION_FAILED: 'Verify the connection URI is correct and the database server is reachable.',
  AUTHENTICATION_FAILED: 'Check the username and password in the connection URI.',
  TIMEOUT: 'Raise requestTimeoutMs, or narrow the scan with keywords.schemas.',
  PERMISSION_DENIED: 'Grant SELECT on every matched table to the scanning login, or exclude its schema with keywords.schemas.',
  TABLE_NOT_FOUND: 'The catalog changed during the run. Run the report again.',
  CONVERSION_FAILED: 'A temporal column holds a value that cannot be cast to DATE. Remove its type from keywords.temporalTypes or clean the data.',
  QUERY_ERROR: 'Inspect the audited batch text for the failing statement.',
  IDENTIFIER_ERROR: 'Rename the object, or exclude its schema with keywords.schemas.',
  SYNTHESIS_ERROR: 'This is a bug in batch generation. Report it with the audited batch text.',
  INTERNAL_ERROR: 'Check the original error for details.',
};

// ─── Driver Error Fields ─────────────────────────────────────────────────────

function readField(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return value;
}

function readString(err: unknown, key: string): string {
  const value = readField(err, key);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function readMessage(err: unknown): string {
  return readString(err, 'message') || String(err);
}

// ─── Per-Dialect Classification ──────────────────────────────────────────────

function classifyMssql(err: unknown): ScanErrorCode | null {
  const code = readString(err, 'code');
  // RequestError keeps the SQL Server error number on `number`
  const number = readString(err, 'number') || readString(readField(err, 'originalError'), 'number');

  if (code === 'ELOGIN' || number === '18456') return 'AUTHENTICATION_FAILED';
  if (code === 'ETIMEOUT') return 'TIMEOUT';
  if (code === 'ESOCKET' || code === 'ECONNCLOSED' || code === 'ECONNREFUSED') return 'CONNECTION_FAILED';
  if (number === '229' || number === '230' || number === '262' || number === '300') return 'PERMISSION_DENIED';
  if (number === '208') return 'TABLE_NOT_FOUND';
  // 529: CAST of a rowversion (SQL Server's `timestamp`) to DATE
  if (number === '241' || number === '242' || number === '245' || number === '529' || number === '8115') return 'CONVERSION_FAILED';
  if (code === 'EREQUEST') return 'QUERY_ERROR';
  return null;
}

function classifyPg(err: unknown): ScanErrorCode | null {
  const code = readString(err, 'code');
  const message = readMessage(err);

  if (code === '28P01' || code === '28000' || message.includes('password authentication failed')) return 'AUTHENTICATION_FAILED';
  if (code === '57014' || message.includes('canceling statement due to statement timeout')) return 'TIMEOUT';
  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND') return 'CONNECTION_FAILED';
  if (code === '42501') return 'PERMISSION_DENIED';
  if (code === '42P01') return 'TABLE_NOT_FOUND';
  if (code === '22007' || code === '22008' || code === '22P02') return 'CONVERSION_FAILED';
  if (code.startsWith('42')) return 'QUERY_ERROR';
  return null;
}

function classifyMysql(err: unknown): ScanErrorCode | null {
  const code = readString(err, 'code');

  switch (code) {
    case 'ER_ACCESS_DENIED_ERROR':
      return 'AUTHENTICATION_FAILED';
    case 'PROTOCOL_SEQUENCE_TIMEOUT':
    case 'ER_QUERY_TIMEOUT':
      return 'TIMEOUT';
    case 'ECONNREFUSED':
    case 'ENOTFOUND':
    case 'PROTOCOL_CONNECTION_LOST':
      return 'CONNECTION_FAILED';
    case 'ER_TABLEACCESS_DENIED_ERROR':
    case 'ER_COLUMNACCESS_DENIED_ERROR':
    case 'ER_DBACCESS_DENIED_ERROR':
      return 'PERMISSION_DENIED';
    case 'ER_NO_SUCH_TABLE':
      return 'TABLE_NOT_FOUND';
    case 'ER_TRUNCATED_WRONG_VALUE':
    case 'ER_WRONG_VALUE':
      return 'CONVERSION_FAILED';
    case 'ER_PARSE_ERROR':
    case 'ER_BAD_FIELD_ERROR':
      return 'QUERY_ERROR';
    default:
      return null;
  }
}

// ─── SQL Error Mapping ───────────────────────────────────────────────────────

export function mapSqlError(err: unknown, dialect: SqlDialect, stage: ScanStage): ScanError {
  if (err instanceof ScanError) return err;

  let code: ScanErrorCode | null;
  switch (dialect) {
    case 'mssql':
      code = classifyMssql(err);
      break;
    case 'pg':
      code = classifyPg(err);
      break;
    case 'mysql2':
      code = classifyMysql(err);
      break;
  }

  const resolved = code ?? 'INTERNAL_ERROR';
  return new ScanError({
    code: resolved,
    message: `${dialect} error during ${stage}: ${readMessage(err)}`,
    fix: FIXES[resolved],
    dialect,
    stage,
    originalError: err,
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function identifierError(
  name: string,
  reason: string,
  context: { schemaName: string; tableName: string; columnName?: string },
  dialect: SqlDialect,
): ScanError {
  const location = context.columnName
    ? `column "${context.columnName}" of ${context.schemaName}.${context.tableName}`
    : `table ${context.schemaName}.${context.tableName}`;

  return new ScanError({
    code: 'IDENTIFIER_ERROR',
    message: `Cannot quote identifier ${JSON.stringify(name)} (${location}): ${reason}.`,
    fix: FIXES.IDENTIFIER_ERROR,
    dialect,
    stage: 'synthesize',
  });
}

export function synthesisError(message: string, dialect: SqlDialect): ScanError {
  return new ScanError({
    code: 'SYNTHESIS_ERROR',
    message,
    fix: FIXES.SYNTHESIS_ERROR,
    dialect,
    stage: 'synthesize',
  });
}

export function configError(issues: string[], dialect: SqlDialect): ScanError {
  return new ScanError({
    code: 'CONFIG_ERROR',
    message: `Invalid configuration: ${issues.join('; ')}.`,
    fix: FIXES.CONFIG_ERROR,
    dialect,
    stage: 'config',
  });
}
