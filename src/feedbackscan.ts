/**
 * FeedbackScan — Feedback Volume Report
 *
 * Finds free-text feedback columns that sit beside a date/time column and
 * counts rows per calendar date across every such table. One run flows through:
 *
 *   FeedbackScan.run()
 *     → adapter.listColumns()   (catalog read)
 *     → findCandidates()        (self-join on table identity)
 *     → synthesizeBatch()       (one UNION ALL batch)
 *     → logger.logBatch()       (audit the batch text)
 *     → adapter.execute()       (single dynamic execution)
 *     → receipts + logger       (RunReceipt, run event)
 */

import type {
  BatchStatement,
  CandidateTuple,
  ColumnDescriptor,
  ConnectionStatus,
  FeedbackScanConfig,
  ScanEvents,
  ScanReport,
} from './types.js';
import { mapSqlError, ScanError } from './errors.js';
import { ScanEventEmitter } from './events.js';
import { ScanLogger } from './logger.js';
import { resolveConfig } from './config.js';
import type { ResolvedConfig } from './config.js';
import { findCandidates } from './scanner.js';
import { synthesizeBatch } from './synthesizer.js';
import { executeBatch } from './executor.js';
import { createReceipt } from './receipts.js';
import type { CatalogAdapter } from './adapters/adapter.js';
import { SqlAdapter } from './adapters/sql-adapter.js';

export type AdapterFactory = (config: ResolvedConfig, emitter: ScanEventEmitter) => CatalogAdapter;

export interface ScanResult {
  columns: ColumnDescriptor[];
  tuples: CandidateTuple[];
}

export class FeedbackScan {
  private adapter: CatalogAdapter;
  private emitter: ScanEventEmitter;
  private logger: ScanLogger;
  private config: ResolvedConfig;

  private constructor(
    config: ResolvedConfig,
    adapter: CatalogAdapter,
    emitter: ScanEventEmitter,
    logger: ScanLogger,
  ) {
    this.config = config;
    this.adapter = adapter;
    this.emitter = emitter;
    this.logger = logger;
  }

  /**
   * Create a connected instance. The dialect is detected from the URI unless set.
   */
  static async create(
    config: FeedbackScanConfig,
    options?: { adapter?: AdapterFactory },
  ): Promise<FeedbackScan> {
    const resolved = resolveConfig(config);
    const emitter = new ScanEventEmitter();
    const logger = new ScanLogger(
      {
        enabled: resolved.logging.enabled,
        verbose: resolved.logging.verbose,
        slowQueryMs: resolved.slowQueryMs,
      },
      emitter,
    );

    const adapter = options?.adapter
      ? options.adapter(resolved, emitter)
      : new SqlAdapter(resolved, emitter);

    await adapter.connect();

    return new FeedbackScan(resolved, adapter, emitter, logger);
  }

  // ─── Pipeline Stages ───────────────────────────────────────────────────────

  async scan(): Promise<ScanResult> {
    const columns = await this.guard('scan', () => this.adapter.listColumns());
    const tuples = findCandidates(columns, this.config.keywords);
    this.logger.logCatalog(this.config.dialect, columns.length, tuples.length);
    return { columns, tuples };
  }

  synthesize(tuples: readonly CandidateTuple[]): BatchStatement {
    try {
      return synthesizeBatch(tuples, this.config.dialect);
    } catch (err) {
      throw this.fail(err, 'synthesize');
    }
  }

  /**
   * Scan and synthesize without executing. Shows the batch run() would send.
   */
  async explain(): Promise<BatchStatement> {
    const { tuples } = await this.scan();
    return this.synthesize(tuples);
  }

  async run(): Promise<ScanReport> {
    const startTime = Date.now();
    const { columns, tuples } = await this.scan();
    const batch = this.synthesize(tuples);

    const outcome = await this.guard('execute', () => executeBatch(this.adapter, batch, this.logger));

    const receipt = createReceipt({
      dialect: this.config.dialect,
      startTime,
      columnsScanned: columns.length,
      tuples: tuples.length,
      statements: batch.statements.length,
      rows: outcome.status === 'ok' ? outcome.rows.length : 0,
      executed: outcome.status === 'ok',
    });
    this.logger.logRun(receipt);

    if (outcome.status === 'empty') {
      return { status: 'empty', message: outcome.message, batch, receipt };
    }
    return { status: 'ok', rows: outcome.rows, batch, receipt };
  }

  // ─── Status ────────────────────────────────────────────────────────────────

  status(): ConnectionStatus {
    return this.adapter.status();
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  on<E extends keyof ScanEvents>(event: E, listener: (payload: ScanEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof ScanEvents>(event: E, listener: (payload: ScanEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof ScanEvents>(event: E, listener: (payload: ScanEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  async close(): Promise<void> {
    await this.adapter.close();
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async guard<T>(stage: 'scan' | 'execute', fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.fail(err, stage);
    }
  }

  private fail(err: unknown, stage: 'scan' | 'synthesize' | 'execute'): ScanError {
    const normalized = mapSqlError(err, this.config.dialect, stage);
    this.logger.logError(normalized);
    return normalized;
  }
}
