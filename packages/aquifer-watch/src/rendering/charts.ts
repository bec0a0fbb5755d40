/**
 * Chart layouts for each RenderRequest kind
 *
 * Every function returns a complete SVG document. Historical points are
 * drawn in blue, forecast points in red, and the end of the observed record
 * as a dashed vertical line.
 */

import { line } from 'd3-shape';
import { PercentileClass, Regime, type LonLat, type Series, type TimePoint } from '../core/types.js';
import { PERCENTILE_CLASS_LABELS, PERCENTILE_CLASS_ORDER } from '../classification/percentile.js';
import { geometryBounds, ringsOf } from '../geometry/normalizer.js';
import { pointsOf, transitionTime } from '../series/reconciler.js';
import type {
  LabelledSeries,
  NetBalanceRequest,
  SeriesBarRequest,
  SeriesLineRequest,
  SeriesOverlayRequest,
  SeriesPanelRequest,
  WellMapRequest,
  ZoneComparisonRequest,
} from './sink.js';
import {
  axes,
  element,
  fmt,
  formatMonth,
  formatValue,
  legend,
  monthTicks,
  placeholder,
  svgDocument,
  text,
  TICK_COUNT,
  timeScale,
  valueScale,
  type Box,
  type Scale,
} from './svg.js';

const WIDTH = 960;
const HEIGHT = 480;
const MARGIN = { top: 56, right: 180, bottom: 48, left: 80 } as const;

export const REGIME_COLORS: Readonly<Record<Regime, string>> = {
  [Regime.HISTORICAL]: '#1E88E5',
  [Regime.FORECAST]: '#E74C3C',
};

export const CLASS_COLORS: Readonly<Record<PercentileClass, string>> = {
  [PercentileClass.LOW]: '#D7191C',
  [PercentileClass.MED_LOW]: '#FDAE61',
  [PercentileClass.MED_HIGH]: '#F5D300',
  [PercentileClass.HIGH]: '#1A9641',
};

const UNCLASSIFIED_COLOR = '#9E9E9E';

const PALETTE = ['#1E88E5', '#E74C3C', '#06A77D', '#8E44AD', '#F39C12', '#2C3E50', '#16A085', '#D35400'];

function paletteColor(index: number): string {
  return PALETTE[index % PALETTE.length] ?? '#333333';
}

function plotBox(height = HEIGHT): Box {
  return {
    x: MARGIN.left,
    y: MARGIN.top,
    width: WIDTH - MARGIN.left - MARGIN.right,
    height: height - MARGIN.top - MARGIN.bottom,
  };
}

// ============================================================================
// Time series
// ============================================================================

interface TimeFrame {
  readonly xScale: Scale;
  readonly yScale: Scale;
  readonly frame: string;
}

function timeFrame(
  box: Box,
  series: readonly Series[],
  yLabel: string | undefined,
  includeZero: boolean
): TimeFrame {
  const points = series.flatMap((s) => s.points);
  const timestamps = points.map((point) => point.timestamp);
  const xScale = timeScale(Math.min(...timestamps), Math.max(...timestamps), [
    box.x,
    box.x + box.width,
  ]);
  const yScale = valueScale(
    points.map((point) => point.value),
    [box.y + box.height, box.y],
    includeZero
  );

  return {
    xScale,
    yScale,
    frame: axes(box, {
      xScale,
      yScale,
      xTicks: monthTicks(xScale),
      yTicks: yScale.ticks(TICK_COUNT),
      formatX: formatMonth,
      yLabel,
    }),
  };
}

function boundaryLine(series: Series, box: Box, xScale: Scale): string {
  const transition = transitionTime(series);
  if (transition === null) return '';
  const x = xScale(transition);
  return element('line', {
    class: 'boundary',
    x1: x,
    x2: x,
    y1: box.y,
    y2: box.y + box.height,
    stroke: '#555555',
    'stroke-dasharray': '4 4',
  });
}

function seriesPath(
  series: Series,
  regime: Regime,
  xScale: Scale,
  yScale: Scale,
  color: string
): string {
  const points = pointsOf(series, regime);
  if (points.length === 0) return '';
  const d = line<TimePoint>()
    .x((point) => xScale(point.timestamp))
    .y((point) => yScale(point.value))(points);
  return element('path', {
    class: regime,
    d: d ?? undefined,
    fill: 'none',
    stroke: color,
    'stroke-width': 2,
    'stroke-dasharray': regime === Regime.FORECAST ? '6 3' : undefined,
  });
}

function linePlot(series: Series, box: Box, yLabel: string | undefined): string {
  if (series.points.length === 0) return placeholder(box, 'No data');

  const { xScale, yScale, frame } = timeFrame(box, [series], yLabel, false);
  return [
    frame,
    seriesPath(series, Regime.HISTORICAL, xScale, yScale, REGIME_COLORS[Regime.HISTORICAL]),
    seriesPath(series, Regime.FORECAST, xScale, yScale, REGIME_COLORS[Regime.FORECAST]),
    boundaryLine(series, box, xScale),
  ].join('');
}

const REGIME_LEGEND = [
  { label: 'Historical', color: REGIME_COLORS[Regime.HISTORICAL] },
  { label: 'Forecast', color: REGIME_COLORS[Regime.FORECAST], dashed: true },
];

export function seriesLineChart(request: SeriesLineRequest): string {
  const box = plotBox();
  return svgDocument(WIDTH, HEIGHT, request.title, [
    linePlot(request.series, box, request.yLabel),
    legend(box.x + box.width + 24, box.y + 8, REGIME_LEGEND),
  ]);
}

export function seriesBarChart(request: SeriesBarRequest): string {
  const box = plotBox();
  const { series } = request;
  if (series.points.length === 0) {
    return svgDocument(WIDTH, HEIGHT, request.title, [placeholder(box, 'No data')]);
  }

  const { xScale, yScale, frame } = timeFrame(box, [series], request.yLabel, true);
  const slot = box.width / series.points.length;
  const barWidth = Math.max(1, slot * 0.8);
  const zero = yScale(0);

  const bars = series.points.map((point) => {
    const top = yScale(point.value);
    return element('rect', {
      class: `bar ${point.regime}`,
      x: xScale(point.timestamp) - barWidth / 2,
      y: Math.min(top, zero),
      width: barWidth,
      height: Math.abs(zero - top),
      fill: REGIME_COLORS[point.regime],
    });
  });

  return svgDocument(WIDTH, HEIGHT, request.title, [
    frame,
    ...bars,
    boundaryLine(series, box, xScale),
    legend(box.x + box.width + 24, box.y + 8, REGIME_LEGEND),
  ]);
}

export function seriesPanelChart(request: SeriesPanelRequest): string {
  const panelHeight = 240;
  const height = MARGIN.top + request.panels.length * panelHeight + MARGIN.bottom;
  const inner = plotBox(height);

  const panels = request.panels.map((panel, index) => {
    const box: Box = {
      x: inner.x,
      y: MARGIN.top + index * panelHeight + 20,
      width: inner.width,
      height: panelHeight - 60,
    };
    return element('g', { class: 'panel' }, [
      text(panel.label, { x: box.x, y: box.y - 8, 'font-weight': 'bold' }),
      linePlot(panel.series, box, undefined),
    ]);
  });

  return svgDocument(WIDTH, Math.max(height, HEIGHT), request.title, [
    ...panels,
    legend(inner.x + inner.width + 24, MARGIN.top + 8, REGIME_LEGEND),
  ]);
}

export function seriesOverlayChart(request: SeriesOverlayRequest): string {
  const box = plotBox();
  const drawn = request.series.filter((entry) => entry.series.points.length > 0);
  if (drawn.length === 0) {
    return svgDocument(WIDTH, HEIGHT, request.title, [placeholder(box, 'No data')]);
  }

  const { xScale, yScale, frame } = timeFrame(
    box,
    drawn.map((entry) => entry.series),
    request.yLabel,
    false
  );

  const lines = drawn.map((entry: LabelledSeries, index) => {
    const color = paletteColor(index);
    return element('g', { class: 'series', 'data-label': entry.label }, [
      seriesPath(entry.series, Regime.HISTORICAL, xScale, yScale, color),
      seriesPath(entry.series, Regime.FORECAST, xScale, yScale, color),
    ]);
  });

  return svgDocument(WIDTH, HEIGHT, request.title, [
    frame,
    ...lines,
    legend(
      box.x + box.width + 24,
      box.y + 8,
      drawn.map((entry, index) => ({ label: entry.label, color: paletteColor(index) }))
    ),
  ]);
}

// ============================================================================
// Zone summaries
// ============================================================================

function categoryFrame(box: Box, values: readonly number[], labels: readonly string[]) {
  const yScale = valueScale(values, [box.y + box.height, box.y], true);
  const slot = labels.length > 0 ? box.width / labels.length : box.width;
  const xCenter = (index: number): number => box.x + slot * (index + 0.5);

  const frame = axes(box, {
    xScale: xCenter,
    yScale,
    xTicks: labels.map((_, index) => index),
    yTicks: yScale.ticks(TICK_COUNT),
    formatX: (index) => labels[index] ?? '',
  });

  return { yScale, slot, xCenter, frame };
}

export function zoneComparisonChart(request: ZoneComparisonRequest): string {
  const box = plotBox();
  if (request.zones.length === 0) {
    return svgDocument(WIDTH, HEIGHT, request.title, [placeholder(box, 'No zones')]);
  }

  const means = request.zones.flatMap((zone) =>
    request.metrics.flatMap((metric) => {
      const stats = zone.metrics[metric];
      return stats ? [stats.mean] : [];
    })
  );
  const { yScale, slot, xCenter, frame } = categoryFrame(
    box,
    means,
    request.zones.map((zone) => zone.zoneId)
  );
  const zero = yScale(0);
  const barWidth = (slot * 0.8) / Math.max(1, request.metrics.length);

  const groups = request.zones.map((zone, zoneIndex) => {
    const left = xCenter(zoneIndex) - (barWidth * request.metrics.length) / 2;
    return element(
      'g',
      { class: 'zone', 'data-zone': zone.zoneId },
      request.metrics.map((metric, metricIndex) => {
        const x = left + metricIndex * barWidth;
        const stats = zone.metrics[metric];
        if (!stats) {
          return text('n/a', {
            class: 'absent',
            'data-metric': metric,
            x: x + barWidth / 2,
            y: zero - 4,
            'text-anchor': 'middle',
            fill: '#888888',
          });
        }
        const top = yScale(stats.mean);
        return element('rect', {
          class: 'bar',
          'data-metric': metric,
          x,
          y: Math.min(top, zero),
          width: barWidth,
          height: Math.abs(zero - top),
          fill: paletteColor(metricIndex),
        });
      })
    );
  });

  return svgDocument(WIDTH, HEIGHT, request.title, [
    frame,
    ...groups,
    legend(
      box.x + box.width + 24,
      box.y + 8,
      request.metrics.map((metric, index) => ({ label: metric, color: paletteColor(index) }))
    ),
  ]);
}

export function netBalanceChart(request: NetBalanceRequest): string {
  const box = plotBox();
  if (request.zones.length === 0) {
    return svgDocument(WIDTH, HEIGHT, request.title, [placeholder(box, 'No zones')]);
  }

  const nets = request.zones.flatMap((zone) =>
    zone.netBalance === undefined ? [] : [zone.netBalance]
  );
  const { yScale, slot, xCenter, frame } = categoryFrame(
    box,
    nets,
    request.zones.map((zone) => zone.zoneId)
  );
  const zero = yScale(0);
  const barWidth = slot * 0.6;

  const bars = request.zones.map((zone, index) => {
    const x = xCenter(index);
    if (zone.netBalance === undefined) {
      return text('n/a', {
        class: 'absent',
        'data-zone': zone.zoneId,
        x,
        y: zero - 4,
        'text-anchor': 'middle',
        fill: '#888888',
      });
    }
    const top = yScale(zone.netBalance);
    return (
      element('rect', {
        class: 'bar',
        'data-zone': zone.zoneId,
        x: x - barWidth / 2,
        y: Math.min(top, zero),
        width: barWidth,
        height: Math.abs(zero - top),
        fill: zone.netBalance >= 0 ? '#06A77D' : '#DD1C1A',
      }) +
      text(formatValue(zone.netBalance), {
        x,
        y: zone.netBalance >= 0 ? top - 4 : top + 14,
        'text-anchor': 'middle',
      })
    );
  });

  return svgDocument(WIDTH, HEIGHT, request.title, [
    frame,
    element('line', { x1: box.x, x2: box.x + box.width, y1: zero, y2: zero, stroke: '#333333' }),
    ...bars,
  ]);
}

// ============================================================================
// Map
// ============================================================================

/**
 * Zones and wells in an equirectangular projection, longitude scaled by the
 * cosine of the mid latitude so shapes keep their proportions
 */
export function wellMapChart(request: WellMapRequest): string {
  const box = plotBox(640);
  const height = 640;

  const bounds = mapBounds(request);
  if (!bounds) {
    return svgDocument(WIDTH, height, request.title, [placeholder(box, 'Nothing to map')]);
  }

  const [west, south, east, north] = bounds;
  const aspect = Math.cos((((south + north) / 2) * Math.PI) / 180);
  const spanX = Math.max((east - west) * aspect, 1e-6);
  const spanY = Math.max(north - south, 1e-6);
  const unit = Math.min(box.width / spanX, box.height / spanY);
  const offsetX = box.x + (box.width - spanX * unit) / 2;
  const offsetY = box.y + (box.height - spanY * unit) / 2;

  const toXY = ([lon, lat]: LonLat): [number, number] => [
    offsetX + (lon - west) * aspect * unit,
    offsetY + (north - lat) * unit,
  ];
  const project = (coordinate: LonLat): string => {
    const [x, y] = toXY(coordinate);
    return `${fmt(x)},${fmt(y)}`;
  };

  const zones = request.zones.map((zone) =>
    element('path', {
      class: 'zone',
      'data-zone': zone.zoneId,
      d: ringsOf(zone.geometry)
        .map((ring) => `M${ring.map(project).join('L')}Z`)
        .join(''),
      fill: '#BBDEFB',
      'fill-opacity': 0.6,
      stroke: '#1565C0',
    })
  );

  const wells = request.wells.map((well) => {
    const [cx, cy] = toXY(well.coordinate);
    return element('circle', {
      class: 'well',
      'data-well-id': well.id,
      'data-class': well.percentileClass,
      cx,
      cy,
      r: 5,
      fill: well.percentileClass ? CLASS_COLORS[well.percentileClass] : UNCLASSIFIED_COLOR,
      stroke: '#000000',
      'stroke-width': 0.5,
    });
  });

  const entries = PERCENTILE_CLASS_ORDER.map((cls) => ({
    label: `${PERCENTILE_CLASS_LABELS[cls]} (${request.counts[cls]})`,
    color: CLASS_COLORS[cls],
  }));

  return svgDocument(WIDTH, height, request.title, [
    ...zones,
    ...wells,
    legend(box.x + box.width + 24, box.y + 8, entries),
  ]);
}

function mapBounds(request: WellMapRequest): [number, number, number, number] | null {
  const zoneBounds = geometryBounds(request.zones.map((zone) => zone.geometry));
  let west = zoneBounds ? zoneBounds[0] : Infinity;
  let south = zoneBounds ? zoneBounds[1] : Infinity;
  let east = zoneBounds ? zoneBounds[2] : -Infinity;
  let north = zoneBounds ? zoneBounds[3] : -Infinity;

  for (const { coordinate: [lon, lat] } of request.wells) {
    west = Math.min(west, lon);
    east = Math.max(east, lon);
    south = Math.min(south, lat);
    north = Math.max(north, lat);
  }

  return Number.isFinite(west) ? [west, south, east, north] : null;
}
