/**
 * feedbackscan — Public API Entry Point
 *
 * Scan a database catalog for feedback columns beside date columns and
 * report daily row volume across every matching table.
 */

// Main class
export { FeedbackScan } from './feedbackscan.js';
export type { AdapterFactory, ScanResult } from './feedbackscan.js';

// Pipeline stages
export { findCandidates, isTextColumn, isTemporalColumn } from './scanner.js';
export { buildStatement, synthesizeBatch, splitBatch, stripTrailingCombinator, UNION_ALL } from './synthesizer.js';
export { executeBatch, NO_CANDIDATES_MESSAGE } from './executor.js';
export { formatReport } from './format.js';
export type { ExecutionOutcome } from './executor.js';

// Configuration
export { resolveConfig, resolveKeywords, configFromEnv, DEFAULT_TEXT_KEYWORDS, DEFAULT_TEMPORAL_KEYWORDS, DEFAULT_TEMPORAL_TYPES } from './config.js';
export type { ResolvedConfig } from './config.js';

// Dialects
export { detectDialect, quoteIdentifier, quoteLiteral } from './dialect.js';

// Errors and events
export { ScanError } from './errors.js';
export { ScanEventEmitter } from './events.js';
export type { CatalogAdapter } from './adapters/adapter.js';

// Types
export type {
  BatchStatement,
  CandidateTuple,
  ColumnDescriptor,
  ConnectionStatus,
  FeedbackScanConfig,
  GeneratedStatement,
  KeywordConfig,
  ResolvedKeywords,
  RunReceipt,
  ScanErrorCode,
  ScanEvents,
  ScanReport,
  ScanStage,
  SqlDialect,
  VolumeRow,
} from './types.js';
