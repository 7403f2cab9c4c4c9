/**
 * feedbackscan Synthesizer — candidate tuples → one UNION ALL batch
 *
 * Every identifier goes through the dialect's quoting and the table label
 * through literal escaping. The batch is built in full before anything runs.
 */

import type { BatchStatement, CandidateTuple, GeneratedStatement, SqlDialect } from './types.js';
import { checkIdentifier, quoteIdentifier, quoteLiteral } from './dialect.js';
import { identifierError, synthesisError } from './errors.js';

export const UNION_ALL = '\nUNION ALL\n';

export const RESULT_COLUMNS = {
  tableName: 'TableName',
  date: 'Date',
  volume: 'Volume',
} as const;

function quoteChecked(
  name: string,
  tuple: CandidateTuple,
  dialect: SqlDialect,
  columnName?: string,
): string {
  const reason = checkIdentifier(name, dialect);
  if (reason) {
    throw identifierError(name, reason, { schemaName: tuple.schemaName, tableName: tuple.tableName, columnName }, dialect);
  }
  return quoteIdentifier(name, dialect);
}

export function buildStatement(tuple: CandidateTuple, dialect: SqlDialect): GeneratedStatement {
  const schema = quoteChecked(tuple.schemaName, tuple, dialect);
  const table = quoteChecked(tuple.tableName, tuple, dialect);
  const temporal = quoteChecked(tuple.temporalColumn, tuple, dialect, tuple.temporalColumn);
  // The text column only qualifies the table, but a name that cannot be quoted still aborts
  quoteChecked(tuple.textColumn, tuple, dialect, tuple.textColumn);

  const label = quoteLiteral(`${tuple.schemaName}.${tuple.tableName}`, dialect);
  const day = `CAST(${temporal} AS DATE)`;
  const alias = (name: string): string => quoteIdentifier(name, dialect);

  const sql =
    `SELECT ${label} AS ${alias(RESULT_COLUMNS.tableName)}, ` +
    `${day} AS ${alias(RESULT_COLUMNS.date)}, ` +
    `COUNT(*) AS ${alias(RESULT_COLUMNS.volume)} ` +
    `FROM ${schema}.${table} ` +
    `WHERE ${temporal} IS NOT NULL ` +
    `GROUP BY ${day}`;

  return { tuple, sql };
}

/**
 * Remove exactly one trailing combinator, verifying it is really there.
 */
export function stripTrailingCombinator(text: string, combinator: string, dialect: SqlDialect): string {
  if (combinator.length === 0) {
    throw synthesisError('Combinator text is empty.', dialect);
  }
  if (!text.endsWith(combinator)) {
    const tail = text.slice(-combinator.length);
    throw synthesisError(
      `Expected batch to end with ${JSON.stringify(combinator)} but it ends with ${JSON.stringify(tail)}.`,
      dialect,
    );
  }
  return text.slice(0, text.length - combinator.length);
}

export function synthesizeBatch(
  tuples: readonly CandidateTuple[],
  dialect: SqlDialect,
  combinator: string = UNION_ALL,
): BatchStatement {
  const statements = tuples.map(tuple => buildStatement(tuple, dialect));
  if (statements.length === 0) {
    return { dialect, sql: '', statements, combinator };
  }

  let assembled = '';
  for (const statement of statements) {
    assembled += statement.sql + combinator;
  }

  return {
    dialect,
    sql: stripTrailingCombinator(assembled, combinator, dialect),
    statements,
    combinator,
  };
}

/**
 * Split a batch back into its statements by walking `batch.statements`.
 * A quoted name may itself contain the combinator text, so the SQL is never
 * split on the combinator string.
 */
export function splitBatch(batch: BatchStatement): string[] {
  const { sql, combinator, dialect } = batch;
  const parts: string[] = [];
  let offset = 0;

  batch.statements.forEach((statement, index) => {
    if (index > 0) {
      if (!sql.startsWith(combinator, offset)) {
        throw synthesisError(`Expected ${JSON.stringify(combinator)} before statement ${index + 1} at offset ${offset}.`, dialect);
      }
      offset += combinator.length;
    }
    if (!sql.startsWith(statement.sql, offset)) {
      throw synthesisError(`Statement ${index + 1} does not appear at offset ${offset} of the batch.`, dialect);
    }
    parts.push(statement.sql);
    offset += statement.sql.length;
  });

  if (offset !== sql.length) {
    throw synthesisError(`Batch has ${sql.length - offset} characters after its last statement.`, dialect);
  }
  return parts;
}
