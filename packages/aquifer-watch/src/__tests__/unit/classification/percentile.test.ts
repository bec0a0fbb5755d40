/**
 * Percentile Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import {
  PERCENTILE_CLASS_LABELS,
  classify,
  classifyEntities,
  classifyValue,
  countByClass,
  percentile,
  percentileBreaks,
} from '../../../classification/percentile.js';
import { InsufficientDataError } from '../../../core/errors.js';
import { PercentileClass, type SpatialEntity } from '../../../core/types.js';

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

function well(id: string, value: number): SpatialEntity {
  return { id, coordinate: [-70, -33], value };
}

describe('percentile', () => {
  it('should interpolate between order statistics', () => {
    expect(percentile([1, 2, 3, 4], 50)).toBe(2.5);
    expect(percentile([10, 20, 30], 0)).toBe(10);
    expect(percentile([10, 20, 30], 100)).toBe(30);
  });

  it('should reject an empty population and out-of-range percentiles', () => {
    expect(() => percentile([], 50)).toThrow(RangeError);
    expect(() => percentile([1, 2], 101)).toThrow(RangeError);
  });
});

describe('percentileBreaks', () => {
  it('should land on exact order statistics for 101 values', () => {
    expect(percentileBreaks(range(1, 101))).toEqual({ p33: 34, p66: 67, p90: 91 });
  });

  it('should not depend on input order', () => {
    const values = [9, 3, 7, 1, 5, 2, 8];
    expect(percentileBreaks(values)).toEqual(percentileBreaks([...values].sort((a, b) => a - b)));
  });

  it('should require four distinct values', () => {
    expect(() => percentileBreaks([5, 5, 6, 7])).toThrow(InsufficientDataError);

    try {
      percentileBreaks([1, 1, 1]);
      expect.unreachable('percentileBreaks should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientDataError);
      if (error instanceof InsufficientDataError) {
        expect(error.distinctValues).toBe(1);
        expect(error.required).toBe(4);
        expect(error.message).toBe(
          'Percentile classification needs at least 4 distinct values, got 1'
        );
      }
    }
  });

  it('should reject non-finite values', () => {
    expect(() => percentileBreaks([1, 2, 3, Number.NaN])).toThrow(RangeError);
  });
});

describe('classifyValue', () => {
  const breaks = { p33: 34, p66: 67, p90: 91 };

  it('should put a value equal to a break in the lower class', () => {
    expect(classifyValue(34, breaks)).toBe(PercentileClass.LOW);
    expect(classifyValue(67, breaks)).toBe(PercentileClass.MED_LOW);
    expect(classifyValue(91, breaks)).toBe(PercentileClass.MED_HIGH);
  });

  it('should band values between breaks', () => {
    expect(classifyValue(-5, breaks)).toBe(PercentileClass.LOW);
    expect(classifyValue(34.5, breaks)).toBe(PercentileClass.MED_LOW);
    expect(classifyValue(67.01, breaks)).toBe(PercentileClass.MED_HIGH);
    expect(classifyValue(92, breaks)).toBe(PercentileClass.HIGH);
  });
});

describe('classify', () => {
  it('should band 1..100 around interpolated breaks', () => {
    const population = range(1, 100).map((value) => ({ id: `w${value}`, value }));
    const classes = classify(population);

    // P33 of 1..100 is 33.67
    expect(classes.get('w33')).toBe(PercentileClass.LOW);
    expect(classes.get('w34')).toBe(PercentileClass.MED_LOW);
    expect(classes.get('w100')).toBe(PercentileClass.HIGH);
    expect([...classes.keys()]).toEqual(population.map((member) => member.id));
  });

  it('should put members equal to a break in the lower class', () => {
    // Breaks of 1..101 are exactly 34, 67 and 91
    const classes = classify(range(1, 101).map((value) => ({ id: `w${value}`, value })));

    expect(classes.get('w34')).toBe(PercentileClass.LOW);
    expect(classes.get('w35')).toBe(PercentileClass.MED_LOW);
    expect(classes.get('w67')).toBe(PercentileClass.MED_LOW);
    expect(classes.get('w68')).toBe(PercentileClass.MED_HIGH);
    expect(classes.get('w91')).toBe(PercentileClass.MED_HIGH);
    expect(classes.get('w92')).toBe(PercentileClass.HIGH);
  });

  it('should give identical results for identical populations', () => {
    const population = [7, 1, 4, 9, 2].map((value, i) => ({ id: `w${i}`, value }));
    expect(classify(population)).toEqual(classify(population));
  });

  it('should classify against the population it is given', () => {
    const small = classify([1, 2, 3, 4].map((value) => ({ id: `w${value}`, value })));
    const large = classify([1, 2, 3, 4, 100, 200].map((value) => ({ id: `w${value}`, value })));

    expect(small.get('w4')).toBe(PercentileClass.HIGH);
    expect(large.get('w4')).toBe(PercentileClass.MED_LOW);
  });
});

describe('classifyEntities', () => {
  it('should attach classes to copies and count them', () => {
    const entities = range(1, 10).map((value) => well(`w${value}`, value));
    const classified = classifyEntities(entities);

    expect(classified.map((entity) => entity.percentileClass)).toEqual([
      PercentileClass.LOW,
      PercentileClass.LOW,
      PercentileClass.LOW,
      PercentileClass.MED_LOW,
      PercentileClass.MED_LOW,
      PercentileClass.MED_LOW,
      PercentileClass.MED_HIGH,
      PercentileClass.MED_HIGH,
      PercentileClass.MED_HIGH,
      PercentileClass.HIGH,
    ]);
    expect(entities[0]?.percentileClass).toBeUndefined();
    expect(Object.isFrozen(classified[0])).toBe(true);

    expect(countByClass(classified)).toEqual({
      [PercentileClass.LOW]: 3,
      [PercentileClass.MED_LOW]: 3,
      [PercentileClass.MED_HIGH]: 3,
      [PercentileClass.HIGH]: 1,
    });
  });

  it('should not count unclassified entities', () => {
    expect(countByClass([well('a', 1), well('b', 2)])).toEqual({
      [PercentileClass.LOW]: 0,
      [PercentileClass.MED_LOW]: 0,
      [PercentileClass.MED_HIGH]: 0,
      [PercentileClass.HIGH]: 0,
    });
  });

  it('should label classes lowest first', () => {
    expect(Object.values(PERCENTILE_CLASS_LABELS)).toEqual(['<P33', 'P33-P66', 'P66-P90', '>P90']);
  });
});
