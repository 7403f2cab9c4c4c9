/**
 * feedbackscan Dialects — quoting, URI handling and catalog queries
 *
 * Everything that differs between SQL Server, PostgreSQL and MySQL lives here.
 * The scanner and synthesizer stay dialect-agnostic.
 */

import type { SqlDialect } from './types.js';

// ─── Detection ───────────────────────────────────────────────────────────────

export function detectDialect(uri: string): SqlDialect {
  if (uri.startsWith('postgresql://') || uri.startsWith('postgres://')) return 'pg';
  if (uri.startsWith('mysql://')) return 'mysql2';
  if (uri.startsWith('mssql://') || uri.startsWith('sqlserver://')) return 'mssql';
  return 'mssql'; // default
}

export function extractDbName(uri: string): string {
  try {
    const url = new URL(uri);
    return decodeURIComponent(url.pathname.replace(/^\//, '')) || 'default';
  } catch {
    return 'default';
  }
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}

// ─── Identifier Quoting ──────────────────────────────────────────────────────

/** Longest identifier each engine accepts. */
export const IDENTIFIER_MAX_LENGTH: Record<SqlDialect, number> = {
  mssql: 128,
  pg: 63,
  mysql2: 64,
};

/**
 * Returns why `name` cannot be quoted for `dialect`, or null when it can.
 */
export function checkIdentifier(name: string, dialect: SqlDialect): string | null {
  if (name.length === 0) return 'identifier is empty';
  if (name.includes('\u0000')) return 'identifier contains a NUL character';
  const max = IDENTIFIER_MAX_LENGTH[dialect];
  if (name.length > max) return `identifier is longer than ${max} characters`;
  return null;
}

export function quoteIdentifier(name: string, dialect: SqlDialect): string {
  switch (dialect) {
    case 'mssql':
      return `[${name.replace(/]/g, ']]')}]`;
    case 'pg':
      return `"${name.replace(/"/g, '""')}"`;
    case 'mysql2':
      return `\`${name.replace(/`/g, '``')}\``;
  }
}

export function quoteLiteral(value: string, dialect: SqlDialect): string {
  switch (dialect) {
    case 'mssql':
      return `N'${value.replace(/'/g, "''")}'`;
    case 'pg':
      return `'${value.replace(/'/g, "''")}'`;
    case 'mysql2':
      // Backslash is an escape character under the default sql_mode
      return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
  }
}

// ─── Temporal Types ──────────────────────────────────────────────────────────

/**
 * Catalog spellings a dialect uses for the configured temporal types.
 * Keys are the configured type, values the extra names that count as it.
 */
export const DIALECT_TYPE_ALIASES: Record<SqlDialect, Readonly<Record<string, readonly string[]>>> = {
  mssql: {},
  pg: {
    timestamp: ['timestamp without time zone', 'timestamp with time zone'],
  },
  mysql2: {},
};

export function expandTemporalTypes(types: Iterable<string>, dialect: SqlDialect): Set<string> {
  const aliases = DIALECT_TYPE_ALIASES[dialect];
  const expanded = new Set<string>();
  for (const type of types) {
    const key = type.toLowerCase();
    expanded.add(key);
    for (const alias of aliases[key] ?? []) {
      expanded.add(alias);
    }
  }
  return expanded;
}

// ─── Catalog Query ───────────────────────────────────────────────────────────

export function buildCatalogSQL(dialect: SqlDialect): string {
  const q = (name: string): string => quoteIdentifier(name, dialect);
  const select =
    `SELECT TABLE_SCHEMA AS ${q('schemaName')}, TABLE_NAME AS ${q('tableName')}, ` +
    `COLUMN_NAME AS ${q('columnName')}, DATA_TYPE AS ${q('dataType')} ` +
    `FROM INFORMATION_SCHEMA.COLUMNS`;
  const order = ` ORDER BY TABLE_SCHEMA, TABLE_NAME, ORDINAL_POSITION`;

  switch (dialect) {
    case 'mssql':
      return select + order;
    case 'pg':
      return select + ` WHERE TABLE_SCHEMA NOT IN ('pg_catalog', 'information_schema')` + order;
    case 'mysql2':
      return select + ` WHERE TABLE_SCHEMA = DATABASE()` + order;
  }
}
