/**
 * feedbackscan Logger — Structured run logging
 *
 * Emits the audit batch, run timing, and slow-run warnings.
 */

import type { BatchStatement, RunReceipt, SqlDialect } from './types.js';
import type { ScanEventEmitter } from './events.js';
import type { ScanError } from './errors.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowQueryMs: number;
}

export class ScanLogger {
  private config: LoggerConfig;
  private emitter: ScanEventEmitter;

  constructor(config: LoggerConfig, emitter: ScanEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Catalog statistics are only reported in verbose mode.
   */
  logCatalog(dialect: SqlDialect, columns: number, tuples: number): void {
    if (!this.config.enabled || !this.config.verbose) return;
    this.emitter.emit('catalog', { dialect, columns, tuples });
  }

  /**
   * Emit the batch text verbatim. Audit is not gated by `enabled`.
   */
  logBatch(batch: BatchStatement): void {
    this.emitter.emit('batch', {
      dialect: batch.dialect,
      sql: batch.sql,
      statements: batch.statements.length,
    });
  }

  logNoCandidates(batch: BatchStatement, message: string): void {
    this.emitter.emit('no-candidates', { dialect: batch.dialect, message });
  }

  /**
   * Log a completed run.
   */
  logRun(receipt: RunReceipt): void {
    if (!this.config.enabled) return;

    this.emitter.emit('run', {
      dialect: receipt.dialect,
      durationMs: receipt.duration,
      receipt,
    });

    if (receipt.executed && receipt.duration >= this.config.slowQueryMs) {
      this.emitter.emit('slow-run', {
        dialect: receipt.dialect,
        durationMs: receipt.duration,
        threshold: this.config.slowQueryMs,
      });
    }
  }

  logError(err: ScanError): void {
    // 'error' without a listener would throw from EventEmitter
    if (this.emitter.listenerCount('error') === 0) return;
    this.emitter.emit('error', {
      code: err.code,
      message: err.message,
      fix: err.fix,
      dialect: err.dialect,
      stage: err.stage,
    });
  }
}
