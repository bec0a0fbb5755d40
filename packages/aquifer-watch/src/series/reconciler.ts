/**
 * Series Reconciler
 *
 * Merges the observed (historical) and modelled (forecast) series of one
 * entity/metric into a single strictly increasing series.
 *
 * RULES:
 * 1. Each input is sorted on its own; upstream order is not trusted.
 * 2. On a shared timestamp the forecast point replaces the historical one.
 * 3. `boundaryIndex` is the index of the first forecast point, or null.
 * 4. Two empty inputs give an empty series; that is not an error.
 * 5. The result is frozen.
 */

import { Regime, type Series, type SeriesKey, type TimePoint } from '../core/types.js';
import { MalformedSeriesError } from '../core/errors.js';

const ANONYMOUS_KEY: SeriesKey = { entityId: 'unknown', metric: 'value' };

export function seriesKeyString(key: SeriesKey): string {
  return `${key.entityId}/${key.metric}`;
}

/**
 * Reconcile historical and forecast points of one (entity, metric)
 *
 * @throws {MalformedSeriesError} Non-finite value or timestamp, a point tagged
 *   with the other regime, or a timestamp repeated within one input
 */
export function reconcile(
  historical: readonly TimePoint[],
  forecast: readonly TimePoint[],
  key: SeriesKey = ANONYMOUS_KEY
): Series {
  const hist = sortChecked(historical, Regime.HISTORICAL, key);
  const fore = sortChecked(forecast, Regime.FORECAST, key);

  const merged: TimePoint[] = [];
  let i = 0;
  let j = 0;

  while (i < hist.length || j < fore.length) {
    const h = hist[i];
    const f = fore[j];

    if (h && (!f || h.timestamp < f.timestamp)) {
      merged.push(h);
      i++;
    } else if (f && (!h || f.timestamp < h.timestamp)) {
      merged.push(f);
      j++;
    } else if (f) {
      // Same timestamp: forecast supersedes the observation
      merged.push(f);
      i++;
      j++;
    }
  }

  const firstForecast = merged.findIndex((point) => point.regime === Regime.FORECAST);

  return Object.freeze({
    entityId: key.entityId,
    metric: key.metric,
    points: Object.freeze(merged),
    boundaryIndex: firstForecast === -1 ? null : firstForecast,
  });
}

function sortChecked(
  points: readonly TimePoint[],
  regime: Regime,
  key: SeriesKey
): TimePoint[] {
  const name = seriesKeyString(key);

  points.forEach((point, index) => {
    if (!Number.isFinite(point.timestamp)) {
      throw new MalformedSeriesError(`${regime} point ${index} has an invalid timestamp`, name, index);
    }
    if (!Number.isFinite(point.value)) {
      throw new MalformedSeriesError(`${regime} point ${index} has a non-finite value`, name, index);
    }
    if (point.regime !== regime) {
      throw new MalformedSeriesError(
        `${regime} input contains a point tagged ${point.regime} at index ${index}`,
        name,
        index
      );
    }
  });

  const sorted = [...points].sort((a, b) => a.timestamp - b.timestamp);

  for (let index = 1; index < sorted.length; index++) {
    const previous = sorted[index - 1];
    const current = sorted[index];
    if (previous && current && previous.timestamp === current.timestamp) {
      throw new MalformedSeriesError(
        `${regime} input repeats timestamp ${new Date(current.timestamp).toISOString()}`,
        name
      );
    }
  }

  return sorted;
}

/**
 * Empty series for an entity with no data
 */
export function emptySeries(key: SeriesKey): Series {
  return reconcile([], [], key);
}

/**
 * Timestamp of the last historical point before the forecast starts
 *
 * This is where charts draw the end-of-observations line. Null when the
 * series has no forecast or no historical point precedes it.
 */
export function transitionTime(series: Series): number | null {
  if (series.boundaryIndex === null || series.boundaryIndex === 0) return null;
  const last = series.points[series.boundaryIndex - 1];
  return last ? last.timestamp : null;
}

/**
 * Points of one regime, in order
 */
export function pointsOf(series: Series, regime: Regime): readonly TimePoint[] {
  return series.points.filter((point) => point.regime === regime);
}
