/**
 * feedbackscan Scanner — catalog columns → candidate tuples
 *
 * Self-join of the column list on (schema, table): every text-like column is
 * paired with every temporal column of the same table. Fan-out is kept; two
 * temporal columns beside one comment column give two tuples.
 */

import type { CandidateTuple, ColumnDescriptor, ResolvedKeywords } from './types.js';

function containsAny(name: string, fragments: ReadonlySet<string>): boolean {
  const lower = name.toLowerCase();
  for (const fragment of fragments) {
    if (lower.includes(fragment)) return true;
  }
  return false;
}

export function isTextColumn(column: ColumnDescriptor, keywords: ResolvedKeywords): boolean {
  return containsAny(column.columnName, keywords.text);
}

export function isTemporalColumn(column: ColumnDescriptor, keywords: ResolvedKeywords): boolean {
  // Type must match a whole entry; `datetime2` is not `datetime`
  return keywords.temporalTypes.has(column.dataType.toLowerCase())
    && containsAny(column.columnName, keywords.temporal);
}

/**
 * Group columns by table, preserving catalog order of first appearance.
 */
export function groupByTable(columns: readonly ColumnDescriptor[]): Map<string, ColumnDescriptor[]> {
  const tables = new Map<string, ColumnDescriptor[]>();
  for (const column of columns) {
    // JSON keeps "a.b"/"c" and "a"/"b.c" apart
    const key = JSON.stringify([column.schemaName, column.tableName]);
    const existing = tables.get(key);
    if (existing) {
      existing.push(column);
    } else {
      tables.set(key, [column]);
    }
  }
  return tables;
}

export function findCandidates(
  columns: readonly ColumnDescriptor[],
  keywords: ResolvedKeywords,
): CandidateTuple[] {
  const scoped = keywords.schemas.size > 0
    ? columns.filter(c => keywords.schemas.has(c.schemaName))
    : columns;

  const tuples: CandidateTuple[] = [];

  for (const tableColumns of groupByTable(scoped).values()) {
    const textColumns = tableColumns.filter(c => isTextColumn(c, keywords));
    if (textColumns.length === 0) continue;
    const temporalColumns = tableColumns.filter(c => isTemporalColumn(c, keywords));

    for (const text of textColumns) {
      for (const temporal of temporalColumns) {
        if (text.columnName === temporal.columnName) continue;
        tuples.push({
          schemaName: text.schemaName,
          tableName: text.tableName,
          textColumn: text.columnName,
          temporalColumn: temporal.columnName,
        });
      }
    }
  }

  return tuples;
}
