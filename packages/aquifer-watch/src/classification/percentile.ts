/**
 * Percentile Classifier
 *
 * Bands a population of well levels into four classes using the 33rd, 66th
 * and 90th percentiles of that same population. Breaks are derived on every
 * call from the explicit population argument; nothing is cached between
 * calls.
 *
 * Percentiles use linear interpolation between order statistics:
 * rank = p/100 * (n - 1).
 *
 * A value equal to a break belongs to the lower class:
 *   v <= P33        -> LOW
 *   P33 < v <= P66  -> MED_LOW
 *   P66 < v <= P90  -> MED_HIGH
 *   v > P90         -> HIGH
 */

import { PercentileClass, type SpatialEntity } from '../core/types.js';
import { InsufficientDataError } from '../core/errors.js';

/** Percentiles bounding the four classes */
export const CLASS_PERCENTILES = [33, 66, 90] as const;

/** Fewer distinct values than this make the breaks degenerate */
export const MIN_DISTINCT_VALUES = 4;

/**
 * Legend labels, lowest class first
 */
export const PERCENTILE_CLASS_LABELS: Readonly<Record<PercentileClass, string>> = {
  [PercentileClass.LOW]: '<P33',
  [PercentileClass.MED_LOW]: 'P33-P66',
  [PercentileClass.MED_HIGH]: 'P66-P90',
  [PercentileClass.HIGH]: '>P90',
};

export const PERCENTILE_CLASS_ORDER: readonly PercentileClass[] = [
  PercentileClass.LOW,
  PercentileClass.MED_LOW,
  PercentileClass.MED_HIGH,
  PercentileClass.HIGH,
];

export interface PercentileBreaks {
  readonly p33: number;
  readonly p66: number;
  readonly p90: number;
}

export interface PopulationMember {
  readonly id: string;
  readonly value: number;
}

/**
 * Percentile of ascending-sorted values, linear interpolation
 *
 * @param sorted - Ascending, non-empty
 * @param p - Percentile in [0, 100]
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError('Cannot take a percentile of an empty population');
  }
  if (p < 0 || p > 100) {
    throw new RangeError(`Percentile must be within [0, 100], got ${p}`);
  }

  // Multiply before dividing so integer percentiles land on exact ranks
  const rank = (p * (sorted.length - 1)) / 100;
  const lowerIndex = Math.floor(rank);
  const upperIndex = Math.ceil(rank);
  const lower = sorted[lowerIndex];
  const upper = sorted[upperIndex];
  if (lower === undefined || upper === undefined) {
    throw new RangeError(`Rank ${rank} outside population of ${sorted.length}`);
  }

  return lower + (upper - lower) * (rank - lowerIndex);
}

/**
 * P33 / P66 / P90 of a population
 *
 * @throws {InsufficientDataError} Fewer than four distinct values
 * @throws {RangeError} A non-finite value
 */
export function percentileBreaks(values: readonly number[]): PercentileBreaks {
  for (const value of values) {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Population contains a non-finite value: ${value}`);
    }
  }

  const distinct = new Set(values).size;
  if (distinct < MIN_DISTINCT_VALUES) {
    throw new InsufficientDataError(distinct, MIN_DISTINCT_VALUES);
  }

  const sorted = [...values].sort((a, b) => a - b);
  const [p33, p66, p90] = CLASS_PERCENTILES;

  return Object.freeze({
    p33: percentile(sorted, p33),
    p66: percentile(sorted, p66),
    p90: percentile(sorted, p90),
  });
}

/**
 * Class of one value against precomputed breaks
 */
export function classifyValue(value: number, breaks: PercentileBreaks): PercentileClass {
  if (value <= breaks.p33) return PercentileClass.LOW;
  if (value <= breaks.p66) return PercentileClass.MED_LOW;
  if (value <= breaks.p90) return PercentileClass.MED_HIGH;
  return PercentileClass.HIGH;
}

/**
 * Classify every member of a population against that population's breaks
 *
 * @returns Class per member id, in input order
 * @throws {InsufficientDataError} Fewer than four distinct values
 */
export function classify(population: readonly PopulationMember[]): Map<string, PercentileClass> {
  const breaks = percentileBreaks(population.map((member) => member.value));
  return new Map(population.map((member) => [member.id, classifyValue(member.value, breaks)]));
}

/**
 * Classify entities and return copies with `percentileClass` attached
 *
 * @throws {InsufficientDataError} Fewer than four distinct values
 */
export function classifyEntities(entities: readonly SpatialEntity[]): SpatialEntity[] {
  const classes = classify(entities);
  return entities.map((entity) =>
    Object.freeze({ ...entity, percentileClass: classes.get(entity.id) })
  );
}

/**
 * Number of entities per class (unclassified entities are not counted)
 */
export function countByClass(
  entities: readonly SpatialEntity[]
): Readonly<Record<PercentileClass, number>> {
  const counts: Record<PercentileClass, number> = {
    [PercentileClass.LOW]: 0,
    [PercentileClass.MED_LOW]: 0,
    [PercentileClass.MED_HIGH]: 0,
    [PercentileClass.HIGH]: 0,
  };
  for (const entity of entities) {
    if (entity.percentileClass) counts[entity.percentileClass] += 1;
  }
  return counts;
}
