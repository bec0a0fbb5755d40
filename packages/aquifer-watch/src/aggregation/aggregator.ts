/**
 * Aggregation Engine
 *
 * Per-zone summaries for the comparative charts. Statistics span both
 * regimes: the comparison views show the full combined evolution.
 *
 * Absence is kept distinct from zero. An empty series has no statistics and
 * a zone missing either balance component has no net balance.
 */

import {
  DEFAULT_BALANCE_METRICS,
  Regime,
  type BalanceMetrics,
  type MetricStats,
  type Series,
  type TimePoint,
  type ZoneAggregate,
} from '../core/types.js';
import { reconcile } from '../series/reconciler.js';

/**
 * mean / min / max of a series, undefined when it has no points
 */
export function summarize(series: Series): MetricStats | undefined {
  if (series.points.length === 0) return undefined;

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const { value } of series.points) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }

  return Object.freeze({
    mean: sum / series.points.length,
    min,
    max,
    count: series.points.length,
  });
}

/**
 * Aggregate the series of one zone
 *
 * @param seriesByMetric - Reconciled series keyed by metric name
 * @param balance - Metrics whose mean difference forms the net balance
 */
export function aggregate(
  zoneId: string,
  seriesByMetric: ReadonlyMap<string, Series>,
  balance: BalanceMetrics = DEFAULT_BALANCE_METRICS
): ZoneAggregate {
  const metrics: Record<string, MetricStats | undefined> = {};
  for (const [metric, series] of seriesByMetric) {
    metrics[metric] = summarize(series);
  }

  const inflow = metrics[balance.inflow];
  const outflow = metrics[balance.outflow];

  return Object.freeze({
    zoneId,
    metrics: Object.freeze(metrics),
    netBalance: inflow && outflow ? inflow.mean - outflow.mean : undefined,
  });
}

/**
 * Series of one zone, as consumed by {@link systemNetSeries}
 */
export interface ZoneSeries {
  readonly zoneId: string;
  readonly seriesByMetric: ReadonlyMap<string, Series>;
}

/**
 * System-wide net balance (inflow - outflow) over time
 *
 * Per timestamp, sums inflow minus outflow across zones, keeping historical
 * and forecast points apart. A zone contributes at a timestamp only where
 * both components have a point of the same regime there. The two sums are
 * then reconciled, so the forecast sum wins on shared timestamps.
 */
export function systemNetSeries(
  zones: readonly ZoneSeries[],
  balance: BalanceMetrics = DEFAULT_BALANCE_METRICS
): Series {
  const sums: Record<Regime, Map<number, number>> = {
    [Regime.HISTORICAL]: new Map(),
    [Regime.FORECAST]: new Map(),
  };

  for (const zone of zones) {
    const inflow = zone.seriesByMetric.get(balance.inflow);
    const outflow = zone.seriesByMetric.get(balance.outflow);
    if (!inflow || !outflow) continue;

    const outflowByKey = new Map(
      outflow.points.map((point) => [pointKey(point), point.value])
    );

    for (const point of inflow.points) {
      const out = outflowByKey.get(pointKey(point));
      if (out === undefined) continue;
      const regimeSums = sums[point.regime];
      regimeSums.set(point.timestamp, (regimeSums.get(point.timestamp) ?? 0) + point.value - out);
    }
  }

  return reconcile(
    toPoints(sums[Regime.HISTORICAL], Regime.HISTORICAL),
    toPoints(sums[Regime.FORECAST], Regime.FORECAST),
    { entityId: 'system', metric: 'net_balance' }
  );
}

function pointKey(point: TimePoint): string {
  return `${point.regime}:${point.timestamp}`;
}

function toPoints(sums: ReadonlyMap<number, number>, regime: Regime): TimePoint[] {
  return [...sums].map(([timestamp, value]) => ({ timestamp, value, regime }));
}
