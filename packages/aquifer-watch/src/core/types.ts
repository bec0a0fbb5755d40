/**
 * Aquifer Watch Core Types
 *
 * Shared data model for the reconciliation and classification pipeline.
 *
 * PHILOSOPHY:
 * - Every value produced by the pipeline is frozen once returned
 * - The regime of a point is an explicit field, never inferred from position
 * - Single vs multi-part geometry is resolved once, at ingestion
 */

// ============================================================================
// Time Series
// ============================================================================

/**
 * Whether a point was observed or produced by the forecast model
 */
export enum Regime {
  HISTORICAL = 'historical',
  FORECAST = 'forecast',
}

/**
 * One measurement of one metric at one instant
 */
export interface TimePoint {
  /** Epoch milliseconds (UTC) */
  readonly timestamp: number;
  readonly value: number;
  readonly regime: Regime;
}

/**
 * Identifies the (entity, metric) pair a series belongs to
 */
export interface SeriesKey {
  /** Zone or well identifier */
  readonly entityId: string;
  /** e.g. `head-absoluto`, `step_in`, `level` */
  readonly metric: string;
}

/**
 * Reconciled, strictly increasing series with a regime boundary
 */
export interface Series extends SeriesKey {
  readonly points: readonly TimePoint[];
  /** Index of the first FORECAST point, null when there is none */
  readonly boundaryIndex: number | null;
}

// ============================================================================
// Spatial Entities
// ============================================================================

/**
 * Percentile band of a value within its population
 */
export enum PercentileClass {
  LOW = 'LOW',
  MED_LOW = 'MED_LOW',
  MED_HIGH = 'MED_HIGH',
  HIGH = 'HIGH',
}

/**
 * [longitude, latitude] in WGS84 degrees
 */
export type LonLat = readonly [number, number];

/**
 * A measured point (a monitoring well)
 */
export interface SpatialEntity {
  readonly id: string;
  readonly coordinate: LonLat;
  readonly value: number;
  readonly percentileClass?: PercentileClass;
}

// ============================================================================
// Geometry
// ============================================================================

/**
 * Implicitly closed ring: the first vertex is not repeated at the end
 */
export type Ring = readonly LonLat[];

/**
 * Normalized polygon geometry (outer rings only)
 */
export type NormalizedGeometry =
  | { readonly kind: 'single'; readonly ring: Ring }
  | { readonly kind: 'multi'; readonly rings: readonly Ring[] };

/**
 * A named zone polygon, drawn as map backdrop
 */
export interface ZoneGeometry {
  readonly zoneId: string;
  readonly geometry: NormalizedGeometry;
}

// ============================================================================
// Aggregates
// ============================================================================

export interface MetricStats {
  readonly mean: number;
  readonly min: number;
  readonly max: number;
  readonly count: number;
}

/**
 * Summary of one zone's series. A metric whose series is empty is present
 * in `metrics` with value `undefined`; `netBalance` is `undefined` when
 * either balance component is missing.
 */
export interface ZoneAggregate {
  readonly zoneId: string;
  readonly metrics: Readonly<Record<string, MetricStats | undefined>>;
  readonly netBalance: number | undefined;
}

/**
 * Names of the inflow and outflow metrics used for net balance
 */
export interface BalanceMetrics {
  readonly inflow: string;
  readonly outflow: string;
}

export const DEFAULT_BALANCE_METRICS: BalanceMetrics = {
  inflow: 'step_in',
  outflow: 'step_out',
};
