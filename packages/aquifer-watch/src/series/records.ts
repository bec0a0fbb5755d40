/**
 * Raw record -> TimePoint conversion
 *
 * Upstream series arrive as `{ date, <field>: number, ... }` rows. A column
 * absent from every row means the metric is absent; a column present in
 * some rows but unusable in another makes the series malformed.
 */

import type { Regime, SeriesKey, TimePoint } from '../core/types.js';
import { MalformedSeriesError } from '../core/errors.js';
import { isFiniteNumber } from '../core/type-guards.js';
import { seriesKeyString } from './reconciler.js';

/**
 * Minimal shape of an upstream time series row
 */
export interface RawSeriesRecord {
  readonly date: string;
  readonly [field: string]: unknown;
}

/**
 * Whether any record carries `field`
 */
export function hasField(records: readonly RawSeriesRecord[], field: string): boolean {
  return records.some((record) => field in record && record[field] !== undefined);
}

/**
 * Parse an upstream date (`YYYY-MM-DD` or ISO 8601) to epoch milliseconds
 *
 * Date-only strings are read as UTC midnight.
 */
export function parseTimestamp(date: string): number {
  return Date.parse(date.trim());
}

/**
 * Convert rows to points of one regime
 *
 * @param field - Value column (`value`, `value_step_in`, ...)
 * @throws {MalformedSeriesError} Unparsable date, missing or non-finite value
 */
export function toTimePoints(
  records: readonly RawSeriesRecord[],
  field: string,
  regime: Regime,
  key: SeriesKey
): TimePoint[] {
  const name = seriesKeyString(key);

  return records.map((record, index) => {
    const timestamp = parseTimestamp(record.date);
    if (Number.isNaN(timestamp)) {
      throw new MalformedSeriesError(
        `Record ${index} has an unparsable date: ${JSON.stringify(record.date)}`,
        name,
        index
      );
    }

    const value = record[field];
    if (!isFiniteNumber(value)) {
      throw new MalformedSeriesError(
        `Record ${index} has no finite ${field}: ${JSON.stringify(value ?? null)}`,
        name,
        index
      );
    }

    return { timestamp, value, regime };
  });
}
