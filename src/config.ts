/**
 * feedbackscan — Configuration resolution
 *
 * Validates user config with zod and resolves it into a normalized form.
 * Keyword lists become lowercase sets so the scanner never touches casing.
 */

import { z } from 'zod';
import type { FeedbackScanConfig, ResolvedKeywords, SqlDialect } from './types.js';
import { detectDialect, expandTemporalTypes } from './dialect.js';
import { configError } from './errors.js';

export const DEFAULT_TEXT_KEYWORDS = ['comment', 'remark', 'feedback'] as const;
export const DEFAULT_TEMPORAL_KEYWORDS = ['date', 'time'] as const;
export const DEFAULT_TEMPORAL_TYPES = ['date', 'datetime', 'smalldatetime', 'timestamp'] as const;

const keywordList = z.array(z.string().trim().min(1, 'must not be blank')).min(1, 'must list at least one entry');

export const configSchema = z.object({
  uri: z.string().min(1, 'is required'),
  dialect: z.enum(['mssql', 'pg', 'mysql2']).optional(),
  label: z.string().min(1).optional(),
  keywords: z.object({
    text: keywordList.optional(),
    temporal: keywordList.optional(),
    temporalTypes: keywordList.optional(),
    schemas: z.array(z.string().min(1)).optional(),
  }).strict().optional(),
  logging: z.union([z.boolean(), z.literal('verbose')]).optional(),
  slowQueryMs: z.number().int().nonnegative().optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
}).strict();

export interface ResolvedConfig {
  uri: string;
  dialect: SqlDialect;
  label: string;
  keywords: ResolvedKeywords;
  logging: { enabled: boolean; verbose: boolean };
  slowQueryMs: number;
  requestTimeoutMs: number;
}

/**
 * Resolve keyword lists into lowercase sets, applying dialect type aliases.
 */
export function resolveKeywords(
  keywords: FeedbackScanConfig['keywords'],
  dialect: SqlDialect,
): ResolvedKeywords {
  const lower = (list: readonly string[]): Set<string> => new Set(list.map(k => k.toLowerCase()));

  return {
    text: lower(keywords?.text ?? DEFAULT_TEXT_KEYWORDS),
    temporal: lower(keywords?.temporal ?? DEFAULT_TEMPORAL_KEYWORDS),
    temporalTypes: expandTemporalTypes(keywords?.temporalTypes ?? DEFAULT_TEMPORAL_TYPES, dialect),
    schemas: new Set(keywords?.schemas ?? []),
  };
}

/**
 * Validate and normalize user-provided config. Throws CONFIG_ERROR listing every issue.
 */
export function resolveConfig(config: FeedbackScanConfig): ResolvedConfig {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    const fallback = typeof config.uri === 'string' ? detectDialect(config.uri) : 'mssql';
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'config'} ${i.message}`);
    throw configError(issues, config.dialect ?? fallback);
  }

  const value = parsed.data;
  const dialect = value.dialect ?? detectDialect(value.uri);

  return {
    uri: value.uri,
    dialect,
    label: value.label ?? 'feedbackscan',
    keywords: resolveKeywords(value.keywords, dialect),
    logging: {
      enabled: value.logging !== false,
      verbose: value.logging === 'verbose',
    },
    slowQueryMs: value.slowQueryMs ?? 1000,
    requestTimeoutMs: value.requestTimeoutMs ?? 30000,
  };
}

function isDialect(value: string): value is SqlDialect {
  return value === 'mssql' || value === 'pg' || value === 'mysql2';
}

function splitList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const items = raw.split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

/**
 * Build a config from FEEDBACKSCAN_* environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): FeedbackScanConfig {
  const uri = env['FEEDBACKSCAN_URI'];
  if (!uri) {
    throw configError(['FEEDBACKSCAN_URI environment variable is required'], 'mssql');
  }

  const dialectRaw = env['FEEDBACKSCAN_DIALECT'];
  let dialect: SqlDialect | undefined;
  if (dialectRaw !== undefined) {
    if (!isDialect(dialectRaw)) {
      throw configError([`FEEDBACKSCAN_DIALECT must be one of mssql, pg, mysql2 (got "${dialectRaw}")`], detectDialect(uri));
    }
    dialect = dialectRaw;
  }

  const loggingRaw = env['FEEDBACKSCAN_LOGGING'];
  const logging = loggingRaw === 'verbose' ? 'verbose' : loggingRaw === 'false' ? false : true;

  const keywords = {
    text: splitList(env['FEEDBACKSCAN_TEXT_KEYWORDS']),
    temporal: splitList(env['FEEDBACKSCAN_TEMPORAL_KEYWORDS']),
    temporalTypes: splitList(env['FEEDBACKSCAN_TEMPORAL_TYPES']),
    schemas: splitList(env['FEEDBACKSCAN_SCHEMAS']),
  };

  return {
    uri,
    dialect,
    label: 'cli',
    keywords,
    logging,
  };
}
