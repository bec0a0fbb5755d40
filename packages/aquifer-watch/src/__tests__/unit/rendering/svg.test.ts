/**
 * SVG Building Block Tests
 */

import { describe, it, expect } from 'vitest';
import {
  element,
  escapeXml,
  fmt,
  formatMonth,
  monthTicks,
  text,
  timeScale,
  valueScale,
} from '../../../rendering/svg.js';
import { artifactFileName } from '../../../rendering/directory-output.js';

describe('escapeXml', () => {
  it('should escape markup characters', () => {
    expect(escapeXml(`<a & "b" 'c'>`)).toBe('&lt;a &amp; &quot;b&quot; &apos;c&apos;&gt;');
  });
});

describe('fmt', () => {
  it('should keep at most two decimals and never print -0', () => {
    expect(fmt(1.23456)).toBe('1.23');
    expect(fmt(10)).toBe('10');
    expect(fmt(-0.001)).toBe('0');
    expect(fmt(-3.5)).toBe('-3.5');
  });
});

describe('element', () => {
  it('should self-close empty elements and skip undefined attributes', () => {
    expect(element('circle', { r: 5, fill: undefined })).toBe('<circle r="5"/>');
  });

  it('should join children and escape attribute values', () => {
    expect(element('g', { 'data-zone': 'A&B' }, ['<x/>', '<y/>'])).toBe(
      '<g data-zone="A&amp;B"><x/><y/></g>'
    );
  });

  it('should escape text content', () => {
    expect(text('a<b', { x: 1.006 })).toBe('<text x="1.01">a&lt;b</text>');
  });
});

describe('valueScale', () => {
  it('should map values linearly onto the range with round ticks', () => {
    const scale = valueScale([0, 10], [100, 0]);

    expect(scale.domain()).toEqual([0, 10]);
    expect(scale(5)).toBe(50);
    expect(scale.ticks(5)).toEqual([0, 2, 4, 6, 8, 10]);
  });

  it('should extend bar domains to zero and round them', () => {
    expect(valueScale([2, 9.5], [100, 0], true).domain()).toEqual([0, 10]);
  });

  it('should widen a constant population around its value', () => {
    const [min, max] = valueScale([5, 5], [0, 100]).domain();

    expect(min).toBeLessThan(5);
    expect(max).toBeGreaterThan(5);
  });
});

describe('monthTicks', () => {
  it('should step by calendar month without repeating a label', () => {
    const scale = timeScale(Date.UTC(2020, 0, 1), Date.UTC(2020, 2, 1), [0, 100]);

    expect(monthTicks(scale).map(formatMonth)).toEqual(['2020-01', '2020-02', '2020-03']);
  });

  it('should widen the step for longer spans', () => {
    const scale = timeScale(Date.UTC(2020, 0, 1), Date.UTC(2022, 0, 1), [0, 100]);

    expect(monthTicks(scale).map(formatMonth)).toEqual([
      '2020-01',
      '2020-07',
      '2021-01',
      '2021-07',
      '2022-01',
    ]);
  });

  it('should switch to whole years past a few years', () => {
    const scale = timeScale(Date.UTC(2010, 3, 1), Date.UTC(2020, 3, 1), [0, 100]);

    expect(monthTicks(scale).map(formatMonth)).toEqual([
      '2012-01',
      '2014-01',
      '2016-01',
      '2018-01',
      '2020-01',
    ]);
  });

  it('should give a single tick when the span stays within one month', () => {
    const start = Date.UTC(2020, 4, 3);
    const scale = timeScale(start, Date.UTC(2020, 4, 20), [0, 100]);

    expect(monthTicks(scale)).toEqual([start]);
  });

  it('should format months in UTC', () => {
    expect(formatMonth(Date.UTC(2021, 5, 15))).toBe('2021-06');
  });
});

describe('artifactFileName', () => {
  it('should keep plain names readable', () => {
    expect(artifactFileName('well/P-01', '.svg')).toBe('well_P-01.svg');
    expect(artifactFileName('heads/Zona 1/head-delta', '.svg')).toBe(
      'heads_Zona%201_head-delta.svg'
    );
  });

  it('should percent-encode everything else as UTF-8', () => {
    expect(artifactFileName('heads/Zona Núcleo/head-absoluto', '.svg')).toBe(
      'heads_Zona%20N%C3%BAcleo_head-absoluto.svg'
    );
    expect(artifactFileName('a_b', '.svg')).toBe('a%5Fb.svg');
    expect(artifactFileName('../escape', '.svg')).toBe('%2E._escape.svg');
  });

  it('should give distinct names distinct files', () => {
    const names = ['a/b', 'a_b', 'a%2Fb', 'Zona Núcleo', 'Zona Nácleo', 'Zona_Núcleo'];
    const files = names.map((name) => artifactFileName(name, '.svg'));

    expect(new Set(files).size).toBe(names.length);
  });

  it('should reject an empty name', () => {
    expect(() => artifactFileName('', '.svg')).toThrow('Artifact name is empty');
  });
});
