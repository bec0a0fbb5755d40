/**
 * Aggregation Engine Tests
 */

import { describe, it, expect } from 'vitest';
import { aggregate, summarize, systemNetSeries } from '../../../aggregation/aggregator.js';
import { reconcile } from '../../../series/reconciler.js';
import { Regime, type Series, type TimePoint } from '../../../core/types.js';

const MONTH = Date.UTC(2020, 1, 1) - Date.UTC(2020, 0, 1);
const T0 = Date.UTC(2020, 0, 1);

function point(month: number, value: number, regime = Regime.HISTORICAL): TimePoint {
  return { timestamp: T0 + month * MONTH, value, regime };
}

function series(zone: string, metric: string, points: TimePoint[]): Series {
  return reconcile(
    points.filter((p) => p.regime === Regime.HISTORICAL),
    points.filter((p) => p.regime === Regime.FORECAST),
    { entityId: zone, metric }
  );
}

describe('summarize', () => {
  it('should compute mean, min and max over both regimes', () => {
    const stats = summarize(
      series('Z1', 'head', [point(0, 2), point(1, -1), point(2, 5, Regime.FORECAST)])
    );

    expect(stats).toEqual({ mean: 2, min: -1, max: 5, count: 3 });
  });

  it('should return undefined for an empty series', () => {
    expect(summarize(series('Z1', 'head', []))).toBeUndefined();
  });
});

describe('aggregate', () => {
  it('should compute net balance as mean inflow minus mean outflow', () => {
    const result = aggregate(
      'Z1',
      new Map([
        ['step_in', series('Z1', 'step_in', [point(0, 8), point(1, 12)])],
        ['step_out', series('Z1', 'step_out', [point(0, 3), point(1, 5)])],
      ])
    );

    expect(result.zoneId).toBe('Z1');
    expect(result.metrics.step_in?.mean).toBe(10);
    expect(result.metrics.step_out?.mean).toBe(4);
    expect(result.netBalance).toBe(6);
  });

  it('should leave net balance absent when the outflow is missing', () => {
    const result = aggregate(
      'Z2',
      new Map([['step_in', series('Z2', 'step_in', [point(0, 8)])]])
    );

    expect(result.netBalance).toBeUndefined();
    expect('step_out' in result.metrics).toBe(false);
  });

  it('should keep an empty metric distinct from zero', () => {
    const result = aggregate(
      'Z3',
      new Map([
        ['step_in', series('Z3', 'step_in', [point(0, 0)])],
        ['step_out', series('Z3', 'step_out', [])],
      ])
    );

    expect('step_out' in result.metrics).toBe(true);
    expect(result.metrics.step_out).toBeUndefined();
    expect(result.metrics.step_in).toEqual({ mean: 0, min: 0, max: 0, count: 1 });
    expect(result.netBalance).toBeUndefined();
  });

  it('should use configured balance metric names', () => {
    const result = aggregate(
      'Z4',
      new Map([
        ['recharge', series('Z4', 'recharge', [point(0, 7)])],
        ['pumping', series('Z4', 'pumping', [point(0, 9)])],
      ]),
      { inflow: 'recharge', outflow: 'pumping' }
    );

    expect(result.netBalance).toBe(-2);
  });
});

describe('systemNetSeries', () => {
  it('should sum per-zone net balance per timestamp and regime', () => {
    const zoneA = new Map([
      ['step_in', series('A', 'step_in', [point(0, 10), point(1, 20, Regime.FORECAST)])],
      ['step_out', series('A', 'step_out', [point(0, 4), point(1, 5, Regime.FORECAST)])],
    ]);
    const zoneB = new Map([
      ['step_in', series('B', 'step_in', [point(0, 3)])],
      ['step_out', series('B', 'step_out', [point(0, 1)])],
    ]);
    const zoneC = new Map([['step_in', series('C', 'step_in', [point(0, 100)])]]);

    const net = systemNetSeries([
      { zoneId: 'A', seriesByMetric: zoneA },
      { zoneId: 'B', seriesByMetric: zoneB },
      { zoneId: 'C', seriesByMetric: zoneC },
    ]);

    expect(net.entityId).toBe('system');
    expect(net.metric).toBe('net_balance');
    expect(net.points).toEqual([point(0, 8), point(1, 15, Regime.FORECAST)]);
    expect(net.boundaryIndex).toBe(1);
  });

  it('should skip timestamps where only one component has a point', () => {
    const zone = new Map([
      ['step_in', series('A', 'step_in', [point(0, 10), point(1, 10)])],
      ['step_out', series('A', 'step_out', [point(1, 4)])],
    ]);

    const net = systemNetSeries([{ zoneId: 'A', seriesByMetric: zone }]);

    expect(net.points).toEqual([point(1, 6)]);
  });

  it('should be empty without zones', () => {
    expect(systemNetSeries([]).points).toEqual([]);
  });
});
