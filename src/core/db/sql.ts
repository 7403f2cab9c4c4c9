/**
 * feedbackscan SQL drivers — one pooled connection per dialect
 *
 * Each driver is reduced to `query(sql) → rows` so the adapter stays
 * dialect-agnostic. Rows come back as plain objects keyed by column alias.
 */

import sql from 'mssql';
import type { config as MssqlConfig } from 'mssql';
import pg from 'pg';
import mysql from 'mysql2/promise';
import type { RowDataPacket } from 'mysql2/promise';
import type { SqlDialect } from '../../types.js';

export type Row = Record<string, unknown>;

export interface SqlConnection {
  query(text: string): Promise<Row[]>;
  close(): Promise<void>;
}

export interface ConnectOptions {
  label?: string;
  requestTimeoutMs: number;
}

// ─── SQL Server ──────────────────────────────────────────────────────────────

export function mssqlConfigFromUri(uri: string, requestTimeoutMs: number): MssqlConfig {
  const url = new URL(uri);
  const params = url.searchParams;
  return {
    server: url.hostname,
    port: url.port ? Number(url.port) : 1433,
    user: decodeURIComponent(url.username) || undefined,
    password: decodeURIComponent(url.password) || undefined,
    database: decodeURIComponent(url.pathname.replace(/^\//, '')) || undefined,
    requestTimeout: requestTimeoutMs,
    options: {
      encrypt: params.get('encrypt') !== 'false',
      trustServerCertificate: params.get('trustServerCertificate') === 'true',
    },
  };
}

async function connectMssql(uri: string, opts: ConnectOptions): Promise<SqlConnection> {
  const pool = new sql.ConnectionPool(mssqlConfigFromUri(uri, opts.requestTimeoutMs));
  try {
    await pool.connect();
  } catch (err) {
    await pool.close();
    throw err;
  }
  return {
    async query(text) {
      const result = await pool.request().query<Row>(text);
      return result.recordset ?? [];
    },
    async close() {
      await pool.close();
    },
  };
}

// ─── PostgreSQL ──────────────────────────────────────────────────────────────

export const PG_DATE_OID = 1082;

async function connectPg(uri: string, opts: ConnectOptions): Promise<SqlConnection> {
  // DATE stays a YYYY-MM-DD string instead of a local-midnight Date.
  // Scoped to this pool; other pg clients in the process keep their parsers.
  const types = new pg.TypeOverrides();
  types.setTypeParser(PG_DATE_OID, (value: string) => value);

  const pool = new pg.Pool({
    connectionString: uri,
    statement_timeout: opts.requestTimeoutMs,
    application_name: opts.label,
    types,
  });
  try {
    const client = await pool.connect();
    client.release();
  } catch (err) {
    await pool.end();
    throw err;
  }

  return {
    async query(text) {
      const result = await pool.query<Row>(text);
      return result.rows;
    },
    async close() {
      await pool.end();
    },
  };
}

// ─── MySQL ───────────────────────────────────────────────────────────────────

async function connectMysql(uri: string, opts: ConnectOptions): Promise<SqlConnection> {
  const pool = mysql.createPool({ uri, dateStrings: true });
  try {
    const conn = await pool.getConnection();
    conn.release();
  } catch (err) {
    await pool.end();
    throw err;
  }

  return {
    async query(text) {
      const [rows] = await pool.query<RowDataPacket[]>({ sql: text, timeout: opts.requestTimeoutMs });
      return rows;
    },
    async close() {
      await pool.end();
    },
  };
}

// ─── Entry Point ─────────────────────────────────────────────────────────────

export async function connect(uri: string, dialect: SqlDialect, opts: ConnectOptions): Promise<SqlConnection> {
  switch (dialect) {
    case 'mssql':
      return connectMssql(uri, opts);
    case 'pg':
      return connectPg(uri, opts);
    case 'mysql2':
      return connectMysql(uri, opts);
  }
}
