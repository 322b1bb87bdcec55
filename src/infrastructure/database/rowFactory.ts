/**
 * Row → Record conversion
 * Layer: Infrastructure
 *
 * A factory is built once per result from its ordered column names and then
 * zips each positional row into a frozen record. When two columns share a
 * name the later one wins, but the key keeps the first position.
 */
import type { QueryOutcome } from '@domain/interfaces/IDbClient';
import { TOTAL_COUNT_COLUMN } from '@shared/constants';
import type { DbRecord, RecordSet } from '@shared/types';

export type RowFactory = (row: readonly unknown[]) => DbRecord;

export function createRowFactory(columns: readonly string[]): RowFactory {
  return (row) => {
    const record: Record<string, unknown> = {};
    columns.forEach((column, index) => {
      record[column] = row[index];
    });
    return Object.freeze(record);
  };
}

/** pg returns COUNT(*) as a bigint string; anything else is a bug upstream. */
function toCount(value: unknown): number {
  const count = typeof value === 'string' ? Number(value) : value;
  if (typeof count !== 'number' || !Number.isSafeInteger(count) || count < 0) {
    throw new TypeError(`Expected a non-negative row count, got ${String(value)}`);
  }
  return count;
}

/**
 * Splits a window-count result into the caller's records and the total.
 * The count is the last column; records carry only the columns before it.
 */
export function splitTotalCount(outcome: QueryOutcome): { records: RecordSet; totalRecords: number } {
  const last = outcome.columns.length - 1;
  if (last < 0 || outcome.columns[last] !== TOTAL_COUNT_COLUMN) {
    throw new TypeError(`Expected "${TOTAL_COUNT_COLUMN}" as the last result column`);
  }

  const [first] = outcome.rows;
  if (!first) return { records: [], totalRecords: 0 };

  const toRecord = createRowFactory(outcome.columns.slice(0, last));
  return {
    records: outcome.rows.map(toRecord),
    totalRecords: toCount(first[last]),
  };
}
