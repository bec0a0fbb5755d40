/**
 * Rendering Sink and Output Location contracts
 *
 * The pipeline describes what to draw as a RenderRequest and never touches
 * files itself. Every request kind carries an artifact `name`; the sink
 * turns it into a path through the OutputLocation and returns that path.
 */

import type {
  PercentileClass,
  Series,
  SpatialEntity,
  ZoneAggregate,
  ZoneGeometry,
} from '../core/types.js';

interface RequestBase {
  /** Artifact name, unique within a run (e.g. `heads/norte/head-delta`) */
  readonly name: string;
  readonly title: string;
}

export interface LabelledSeries {
  readonly label: string;
  readonly series: Series;
}

/** One reconciled series as a line, with the regime boundary marked */
export interface SeriesLineRequest extends RequestBase {
  readonly kind: 'series-line';
  readonly yLabel: string;
  readonly series: Series;
}

/** One reconciled series as bars coloured by regime */
export interface SeriesBarRequest extends RequestBase {
  readonly kind: 'series-bar';
  readonly yLabel: string;
  readonly series: Series;
}

/** Several series stacked vertically, one panel each */
export interface SeriesPanelRequest extends RequestBase {
  readonly kind: 'series-panel';
  readonly panels: readonly LabelledSeries[];
}

/** Several series drawn over one shared time axis */
export interface SeriesOverlayRequest extends RequestBase {
  readonly kind: 'series-overlay';
  readonly yLabel: string;
  readonly series: readonly LabelledSeries[];
}

/** Mean of each metric per zone, grouped by zone */
export interface ZoneComparisonRequest extends RequestBase {
  readonly kind: 'zone-comparison';
  readonly metrics: readonly string[];
  readonly zones: readonly ZoneAggregate[];
}

/** Net balance per zone; zones without one are listed, not drawn */
export interface NetBalanceRequest extends RequestBase {
  readonly kind: 'net-balance';
  readonly zones: readonly ZoneAggregate[];
}

/** Zone backdrop with classified wells and per-class counts */
export interface WellMapRequest extends RequestBase {
  readonly kind: 'well-map';
  readonly zones: readonly ZoneGeometry[];
  readonly wells: readonly SpatialEntity[];
  readonly counts: Readonly<Record<PercentileClass, number>>;
}

export type RenderRequest =
  | SeriesLineRequest
  | SeriesBarRequest
  | SeriesPanelRequest
  | SeriesOverlayRequest
  | ZoneComparisonRequest
  | NetBalanceRequest
  | WellMapRequest;

export type RenderKind = RenderRequest['kind'];

export interface RenderingSink {
  /**
   * Draw one artifact
   *
   * @returns Path of the written artifact
   */
  render(request: RenderRequest): Promise<string>;
}

/**
 * Directory-like destination for artifacts
 */
export interface OutputLocation {
  /** Create the destination if it does not exist */
  prepare(): Promise<void>;
  /** Path for an artifact file name */
  resolve(fileName: string): string;
}
