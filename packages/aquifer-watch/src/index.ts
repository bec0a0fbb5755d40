/**
 * Aquifer Watch - Groundwater series reconciliation and well classification
 *
 * aquifer-watch provides:
 * - Historical/forecast series reconciliation with an explicit regime boundary
 * - Percentile classification of well level populations
 * - Polygon normalization from projected CRS to WGS84
 * - Per-zone aggregation and system net balance
 * - A unit-by-unit pipeline with a partial-success run manifest
 *
 * @packageDocumentation
 */

// Core types and errors
export {
  DEFAULT_BALANCE_METRICS,
  PercentileClass,
  Regime,
  type BalanceMetrics,
  type LonLat,
  type MetricStats,
  type NormalizedGeometry,
  type Ring,
  type Series,
  type SeriesKey,
  type SpatialEntity,
  type TimePoint,
  type ZoneAggregate,
  type ZoneGeometry,
} from './core/types.js';
export {
  DuplicateUnitError,
  GeometryError,
  InsufficientDataError,
  MalformedSeriesError,
  PipelineError,
  RetrievalError,
  errorKind,
  errorMessage,
  type ErrorKind,
} from './core/errors.js';
export { logger, createLogger, setLogLevel, type LogLevel } from './core/utils/logger.js';

// Geometry
export { WGS84, createTransform, isSupportedCrs } from './geometry/crs.js';
export {
  geometryBounds,
  normalizeGeometry,
  normalizeZoneFeatures,
  ringsOf,
  toGeoJSON,
  type RawZoneFeature,
  type ZoneNormalizationResult,
} from './geometry/normalizer.js';

// Classification
export {
  PERCENTILE_CLASS_LABELS,
  classify,
  classifyEntities,
  classifyValue,
  countByClass,
  percentile,
  percentileBreaks,
  type PercentileBreaks,
  type PopulationMember,
} from './classification/percentile.js';

// Series
export { emptySeries, pointsOf, reconcile, transitionTime } from './series/reconciler.js';
export { hasField, toTimePoints, type RawSeriesRecord } from './series/records.js';

// Aggregation
export { aggregate, summarize, systemNetSeries, type ZoneSeries } from './aggregation/aggregator.js';

// Retrieval
export {
  HydrometRetrievalClient,
  type HydrometClientOptions,
  type RetrievalClient,
} from './retrieval/client.js';
export {
  DEFAULT_BASE_URL,
  HEAD_DATASETS,
  endpoint,
  endpointUrl,
  type EndpointDescriptor,
  type EndpointKind,
  type EndpointParams,
  type RecordsByEndpoint,
} from './retrieval/endpoints.js';
export { wellEntitiesFromFeatures, type WellPropertyNames } from './retrieval/wells.js';

// Rendering
export type { OutputLocation, RenderRequest, RenderingSink } from './rendering/sink.js';
export { DirectoryOutput } from './rendering/directory-output.js';
export { SvgRenderingSink, renderSvg } from './rendering/svg-sink.js';

// Pipeline
export {
  PipelineOrchestrator,
  DEFAULT_PIPELINE_OPTIONS,
  unitSegment,
} from './pipeline/orchestrator.js';
export { ALL_PASSES, type PassName, type PipelineOptions } from './pipeline/orchestrator.types.js';
export {
  ManifestBuilder,
  summarizeManifest,
  type RunManifest,
  type UnitOutcome,
} from './pipeline/manifest.js';
