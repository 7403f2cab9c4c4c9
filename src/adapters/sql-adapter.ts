/**
 * feedbackscan SQL Adapter
 *
 * Wraps core/db/sql.ts. Reads INFORMATION_SCHEMA.COLUMNS and runs the
 * synthesized batch; every driver error is normalized through mapSqlError.
 */

import { z } from 'zod';
import type { CatalogAdapter } from './adapter.js';
import type {
  ColumnDescriptor,
  ConnectionStatus,
  SqlDialect,
} from '../types.js';
import type { ResolvedConfig } from '../config.js';
import { mapSqlError, ScanError } from '../errors.js';
import type { ScanEventEmitter } from '../events.js';
import { buildCatalogSQL, extractDbName, redactUri } from '../dialect.js';
import * as sql from '../core/db/sql.js';

const catalogRowSchema = z.object({
  schemaName: z.string(),
  tableName: z.string(),
  columnName: z.string(),
  dataType: z.string(),
});

export class SqlAdapter implements CatalogAdapter {
  readonly dialect: SqlDialect;
  private config: ResolvedConfig;
  private emitter: ScanEventEmitter;
  private connection: sql.SqlConnection | null = null;
  private connectedAt: Date | null = null;
  private closed = false;

  constructor(config: ResolvedConfig, emitter: ScanEventEmitter) {
    this.config = config;
    this.emitter = emitter;
    this.dialect = config.dialect;
  }

  async connect(): Promise<void> {
    try {
      this.connection = await sql.connect(this.config.uri, this.dialect, {
        label: this.config.label,
        requestTimeoutMs: this.config.requestTimeoutMs,
      });
      this.connectedAt = new Date();
      this.closed = false;
      this.emitter.emit('connected', {
        dialect: this.dialect,
        dbName: extractDbName(this.config.uri),
        label: this.config.label,
      });
    } catch (err) {
      throw mapSqlError(err, this.dialect, 'connect');
    }
  }

  async close(): Promise<void> {
    if (!this.connection) return;
    const connection = this.connection;
    this.connection = null;
    this.connectedAt = null;
    this.closed = true;
    await connection.close();
    this.emitter.emit('closed', { dialect: this.dialect });
  }

  status(): ConnectionStatus {
    return {
      state: this.connectedAt ? 'connected' : this.closed ? 'closed' : 'disconnected',
      dialect: this.dialect,
      uri: redactUri(this.config.uri),
      dbName: extractDbName(this.config.uri),
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
    };
  }

  async listColumns(): Promise<ColumnDescriptor[]> {
    const connection = this.requireConnection('scan');
    try {
      const rows = await connection.query(buildCatalogSQL(this.dialect));
      return z.array(catalogRowSchema).parse(rows);
    } catch (err) {
      throw mapSqlError(err, this.dialect, 'scan');
    }
  }

  async execute(batchSql: string): Promise<Array<Record<string, unknown>>> {
    const connection = this.requireConnection('execute');
    try {
      return await connection.query(batchSql);
    } catch (err) {
      throw mapSqlError(err, this.dialect, 'execute');
    }
  }

  private requireConnection(stage: 'scan' | 'execute'): sql.SqlConnection {
    if (this.connection) return this.connection;
    throw new ScanError({
      code: 'CONNECTION_FAILED',
      message: `No open ${this.dialect} connection.`,
      fix: 'Create the scanner with FeedbackScan.create(), which connects before returning, and do not use it after close().',
      dialect: this.dialect,
      stage,
    });
  }
}
