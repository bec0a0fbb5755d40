/**
 * SVG building blocks
 *
 * String-based: no DOM, no layout engine. Numbers are written with at most
 * two decimals so artifacts are stable between runs. Scales, ticks and date
 * labels come from d3.
 */

import { scaleLinear, scaleUtc, type ScaleLinear, type ScaleTime } from 'd3-scale';
import { utcMonth, utcYear, type TimeInterval } from 'd3-time';
import { utcFormat } from 'd3-time-format';

export interface Box {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export type Attributes = Readonly<Record<string, string | number | undefined>>;

const XML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

/**
 * Number with at most two decimals, no trailing zeros, never `-0`
 */
export function fmt(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export function element(
  tag: string,
  attributes: Attributes = {},
  children: string | readonly string[] = []
): string {
  const attrs = Object.entries(attributes)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([key, value]) => ` ${key}="${typeof value === 'number' ? fmt(value) : escapeXml(value)}"`)
    .join('');
  const content = typeof children === 'string' ? children : children.join('');
  return content.length > 0 ? `<${tag}${attrs}>${content}</${tag}>` : `<${tag}${attrs}/>`;
}

export function text(content: string, attributes: Attributes): string {
  return element('text', attributes, escapeXml(content));
}

/**
 * Standalone SVG document with a visible and an accessible title
 */
export function svgDocument(
  width: number,
  height: number,
  title: string,
  body: readonly string[]
): string {
  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    element(
      'svg',
      {
        xmlns: 'http://www.w3.org/2000/svg',
        width,
        height,
        viewBox: `0 0 ${fmt(width)} ${fmt(height)}`,
        'font-family': 'sans-serif',
        'font-size': 12,
      },
      [
        element('title', {}, escapeXml(title)),
        element('rect', { x: 0, y: 0, width, height, fill: '#ffffff' }),
        text(title, { x: width / 2, y: 28, 'text-anchor': 'middle', 'font-size': 16, 'font-weight': 'bold' }),
        ...body,
      ]
    ) +
    '\n'
  );
}

// ============================================================================
// Scales
// ============================================================================

export type Scale = (value: number) => number;

/** Approximate number of ticks per axis */
export const TICK_COUNT = 5;

/** Month steps tried before falling back to whole years */
const MONTH_STEPS = [1, 2, 3, 6] as const;

const monthFormat = utcFormat('%Y-%m');

/**
 * Value axis over `values`, widened to round bounds
 *
 * A constant population is widened by 10% of its value (or 1 at zero).
 *
 * @param includeZero - Extend the domain to zero first (bar charts)
 */
export function valueScale(
  values: readonly number[],
  range: readonly [number, number],
  includeZero = false
): ScaleLinear<number, number> {
  let min = values.length > 0 ? Math.min(...values) : 0;
  let max = values.length > 0 ? Math.max(...values) : 1;
  if (includeZero) {
    min = Math.min(min, 0);
    max = Math.max(max, 0);
  }
  if (min === max) {
    const pad = Math.abs(min) * 0.1 || 1;
    min -= pad;
    max += pad;
  }
  return scaleLinear().domain([min, max]).range(range).nice(TICK_COUNT);
}

/**
 * UTC time axis over [start, end] (epoch milliseconds)
 */
export function timeScale(
  start: number,
  end: number,
  range: readonly [number, number]
): ScaleTime<number, number> {
  return scaleUtc().domain([start, end]).range(range);
}

/**
 * Calendar month ticks of a time axis, at most about `count` of them
 *
 * Steps go 1, 2, 3 or 6 months, then whole years, so no two ticks share a
 * `YYYY-MM` label.
 */
export function monthTicks(scale: ScaleTime<number, number>, count = TICK_COUNT): number[] {
  const [start, end] = scale.domain();
  if (!start || !end) return [];
  const months = utcMonth.count(start, end);
  if (months === 0) return [start.getTime()];
  return scale.ticks(calendarInterval(months, count)).map((date) => date.getTime());
}

function calendarInterval(months: number, count: number): TimeInterval {
  const step = MONTH_STEPS.find((candidate) => months / candidate <= count);
  if (step !== undefined) return utcMonth.every(step) ?? utcMonth;
  return utcYear.every(Math.ceil(months / 12 / count)) ?? utcYear;
}

/**
 * `YYYY-MM` in UTC
 */
export function formatMonth(timestamp: number): string {
  return monthFormat(new Date(timestamp));
}

export function formatValue(value: number): string {
  return Math.abs(value) >= 1000 ? value.toFixed(0) : fmt(value);
}

// ============================================================================
// Axes
// ============================================================================

export interface AxisOptions {
  readonly xScale: Scale;
  readonly yScale: Scale;
  readonly xTicks: readonly number[];
  readonly yTicks: readonly number[];
  readonly formatX: (value: number) => string;
  readonly yLabel?: string;
}

/**
 * Left and bottom axes with tick labels and horizontal grid lines
 */
export function axes(box: Box, options: AxisOptions): string {
  const bottom = box.y + box.height;
  const parts: string[] = [];

  for (const tick of options.yTicks) {
    const y = options.yScale(tick);
    parts.push(
      element('line', { x1: box.x, x2: box.x + box.width, y1: y, y2: y, stroke: '#e5e5e5' }),
      text(formatValue(tick), { x: box.x - 6, y: y + 4, 'text-anchor': 'end', fill: '#555555' })
    );
  }
  for (const tick of options.xTicks) {
    const x = options.xScale(tick);
    parts.push(
      element('line', { x1: x, x2: x, y1: bottom, y2: bottom + 4, stroke: '#333333' }),
      text(options.formatX(tick), { x, y: bottom + 18, 'text-anchor': 'middle', fill: '#555555' })
    );
  }

  parts.push(
    element('line', { x1: box.x, x2: box.x, y1: box.y, y2: bottom, stroke: '#333333' }),
    element('line', { x1: box.x, x2: box.x + box.width, y1: bottom, y2: bottom, stroke: '#333333' })
  );

  if (options.yLabel) {
    const cx = box.x - 48;
    const cy = box.y + box.height / 2;
    parts.push(
      text(options.yLabel, {
        x: cx,
        y: cy,
        'text-anchor': 'middle',
        transform: `rotate(-90 ${fmt(cx)} ${fmt(cy)})`,
      })
    );
  }

  return element('g', { class: 'axes' }, parts);
}

/**
 * Message drawn in place of a plot that has nothing to show
 */
export function placeholder(box: Box, message: string): string {
  return text(message, {
    class: 'no-data',
    x: box.x + box.width / 2,
    y: box.y + box.height / 2,
    'text-anchor': 'middle',
    fill: '#888888',
  });
}

/**
 * Legend rows starting at (x, y), one swatch per entry
 */
export function legend(
  x: number,
  y: number,
  entries: readonly { readonly label: string; readonly color: string; readonly dashed?: boolean }[]
): string {
  return element(
    'g',
    { class: 'legend' },
    entries.map((entry, index) => {
      const rowY = y + index * 18;
      return (
        element('line', {
          x1: x,
          x2: x + 20,
          y1: rowY,
          y2: rowY,
          stroke: entry.color,
          'stroke-width': 3,
          'stroke-dasharray': entry.dashed ? '6 3' : undefined,
        }) + text(entry.label, { x: x + 26, y: rowY + 4 })
      );
    })
  );
}
