/**
 * Pipeline Orchestrator
 *
 * Runs the heads, balance and wells passes as a sequence of units. Each unit
 * is retrieved, transformed and rendered to completion before the next one
 * starts. A failing unit is recorded in the manifest and the run moves on;
 * nothing is retried.
 *
 * The wells pass has one step that spans units: percentile classification
 * runs once over the whole level population after every well retrieval has
 * finished and before any well artifact is rendered. If it cannot run, the
 * run ends with a fatal manifest entry.
 *
 * Unit ids and artifact names embed upstream names with `/` and `%`
 * percent-encoded, so every zone and well maps to its own id.
 */

import {
  DEFAULT_BALANCE_METRICS,
  type PercentileClass,
  Regime,
  type Series,
  type SeriesKey,
  type SpatialEntity,
  type ZoneAggregate,
  type ZoneGeometry,
} from '../core/types.js';
import {
  DuplicateUnitError,
  InsufficientDataError,
  RetrievalError,
  errorKind,
  errorMessage,
} from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { aggregate, systemNetSeries, type ZoneSeries } from '../aggregation/aggregator.js';
import {
  MIN_DISTINCT_VALUES,
  PERCENTILE_CLASS_LABELS,
  classifyEntities,
  countByClass,
} from '../classification/percentile.js';
import { WGS84 } from '../geometry/crs.js';
import { normalizeZoneFeatures } from '../geometry/normalizer.js';
import type { RetrievalClient } from '../retrieval/client.js';
import { HEAD_DATASETS, endpoint } from '../retrieval/endpoints.js';
import type { ListItem, WellInfo } from '../retrieval/schemas.js';
import { DEFAULT_WELL_PROPERTIES, wellEntitiesFromFeatures } from '../retrieval/wells.js';
import type { LabelledSeries, OutputLocation, RenderingSink } from '../rendering/sink.js';
import { reconcile } from '../series/reconciler.js';
import { hasField, toTimePoints, type RawSeriesRecord } from '../series/records.js';
import { ManifestBuilder, type RunManifest } from './manifest.js';
import type { PassName, PipelineDependencies, PipelineOptions } from './orchestrator.types.js';

const log = createLogger({ module: 'pipeline' });

/** Unit of the system-wide balance charts, outside the per-zone namespace */
const BALANCE_SYSTEM = 'balance-system';

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  headDatasets: HEAD_DATASETS,
  balanceMetrics: ['step_in', 'step_out', 'step_rate'],
  balance: DEFAULT_BALANCE_METRICS,
  zoneCrs: 'EPSG:32719',
  wellCrs: WGS84,
  wellIds: [],
  wellProperties: DEFAULT_WELL_PROPERTIES,
};

/** Value column of the head and well series */
const VALUE_FIELD = 'value';

/** Metric name of well level series */
const WELL_METRIC = 'level';

const HEAD_LABELS: Readonly<Record<string, string>> = {
  'head-absoluto': 'Head (m a.s.l.)',
  'head-delta': 'Head change (m)',
};

/**
 * What a unit body reports back on success; `value` is handed to the caller
 */
interface UnitResult<T> {
  readonly artifacts?: readonly string[];
  readonly noData?: boolean;
  readonly value?: T;
}

/**
 * Upstream name as one unit id segment
 */
export function unitSegment(name: string): string {
  return name.replace(/[%/]/g, (char) => (char === '%' ? '%25' : '%2F'));
}

interface WellRecord {
  readonly id: string;
  readonly info: WellInfo;
  readonly series: Series;
}

export class PipelineOrchestrator {
  private readonly client: RetrievalClient;
  private readonly sink: RenderingSink;
  private readonly output: OutputLocation;
  private readonly clock: (() => Date) | undefined;
  private readonly options: PipelineOptions;

  constructor(dependencies: PipelineDependencies, options: Partial<PipelineOptions> = {}) {
    this.client = dependencies.client;
    this.sink = dependencies.sink;
    this.output = dependencies.output;
    this.clock = dependencies.clock;
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options };
  }

  /**
   * Run the given passes in order and return the manifest
   *
   * @throws When the output location cannot be prepared
   */
  async run(passes: readonly PassName[]): Promise<RunManifest> {
    const manifest = new ManifestBuilder(this.clock);
    await this.output.prepare();

    log.info('Run started', { passes: passes.join(',') });
    const startTime = Date.now();

    for (const pass of passes) {
      if (manifest.isFatal) break;
      switch (pass) {
        case 'heads':
          await this.runHeads(manifest);
          break;
        case 'balance':
          await this.runBalance(manifest);
          break;
        case 'wells':
          await this.runWells(manifest);
          break;
      }
    }

    const result = manifest.build();
    log.info('Run finished', {
      durationMs: Date.now() - startTime,
      units: Object.keys(result.entries).length,
      fatal: result.fatal !== undefined,
    });
    return result;
  }

  // ==========================================================================
  // Units
  // ==========================================================================

  /**
   * Execute one unit, recording success or failure. Never throws.
   *
   * @returns The body's `value`, undefined when the unit failed
   */
  private async unit<T = void>(
    manifest: ManifestBuilder,
    unitId: string,
    body: () => Promise<UnitResult<T>>
  ): Promise<T | undefined> {
    if (manifest.isFatal || !this.claim(manifest, unitId)) return undefined;

    const startTime = Date.now();
    log.info('Unit started', { unit: unitId });

    try {
      const result = await body();
      const artifacts = result.artifacts ?? [];
      manifest.success(unitId, artifacts, { noData: result.noData });
      log.info('Unit succeeded', {
        unit: unitId,
        durationMs: Date.now() - startTime,
        artifacts: artifacts.length,
        ...(result.noData && { noData: true }),
      });
      return result.value;
    } catch (error) {
      manifest.failure(unitId, error);
      log.warn('Unit failed', {
        unit: unitId,
        durationMs: Date.now() - startTime,
        kind: errorKind(error),
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  /**
   * False, and the run ended, when `unitId` is already recorded
   */
  private claim(manifest: ManifestBuilder, unitId: string): boolean {
    if (!manifest.has(unitId)) return true;
    const error = new DuplicateUnitError(unitId);
    manifest.setFatal('units', error);
    log.error('Duplicate unit, ending run', { unit: unitId });
    return false;
  }

  private async zoneList(
    manifest: ManifestBuilder,
    family: 'heads' | 'balance'
  ): Promise<readonly ListItem[] | undefined> {
    return this.unit(manifest, `${family}/zones`, async () => ({
      value: await this.client.fetch(endpoint('zone-list', { family })),
    }));
  }

  // ==========================================================================
  // Heads
  // ==========================================================================

  private async runHeads(manifest: ManifestBuilder): Promise<void> {
    const zones = await this.zoneList(manifest, 'heads');
    if (!zones) return;

    for (const zone of zones) {
      for (const dataset of this.options.headDatasets) {
        const unitId = `heads/${unitSegment(zone.name)}/${dataset}`;
        await this.unit(manifest, unitId, async () => {
          const key: SeriesKey = { entityId: zone.name, metric: dataset };
          const [historical, forecast] = await this.fetchZoneSeries(zone, {
            family: 'heads',
            dataset,
          });

          if (historical.length === 0 && forecast.length === 0) {
            return { noData: true };
          }

          const series = reconcile(
            toTimePoints(historical, VALUE_FIELD, Regime.HISTORICAL, key),
            toTimePoints(forecast, VALUE_FIELD, Regime.FORECAST, key),
            key
          );

          const path = await this.sink.render({
            kind: 'series-line',
            name: unitId,
            title: `Zone ${zone.name} - ${dataset}`,
            yLabel: HEAD_LABELS[dataset] ?? dataset,
            series,
          });
          return { artifacts: [path] };
        });
      }
    }
  }

  private async fetchZoneSeries(
    zone: ListItem,
    source: { family: 'heads'; dataset: string } | { family: 'balance' }
  ): Promise<[RawSeriesRecord[], RawSeriesRecord[]]> {
    const historical = await this.client.fetch(
      endpoint('zone-series', { ...source, zone: zone.id, regime: Regime.HISTORICAL })
    );
    const forecast = await this.client.fetch(
      endpoint('zone-series', { ...source, zone: zone.id, regime: Regime.FORECAST })
    );
    return [historical, forecast];
  }

  // ==========================================================================
  // Balance
  // ==========================================================================

  private async runBalance(manifest: ManifestBuilder): Promise<void> {
    const zones = await this.zoneList(manifest, 'balance');
    if (!zones) return;

    const aggregates: ZoneAggregate[] = [];
    const zoneSeries: ZoneSeries[] = [];

    for (const zone of zones) {
      const unitId = `balance/${unitSegment(zone.name)}`;
      await this.unit(manifest, unitId, async () => {
        const [historical, forecast] = await this.fetchZoneSeries(zone, { family: 'balance' });
        const seriesByMetric = this.balanceSeries(zone.name, historical, forecast);

        const zoneAggregate = aggregate(zone.name, seriesByMetric, this.options.balance);
        log.debug('Zone aggregate', {
          zone: zone.name,
          netBalance: zoneAggregate.netBalance ?? 'absent',
        });

        if (seriesByMetric.size === 0) {
          aggregates.push(zoneAggregate);
          return { noData: true };
        }

        const artifacts: string[] = [];
        for (const [metric, series] of seriesByMetric) {
          artifacts.push(
            await this.sink.render({
              kind: 'series-bar',
              name: `${unitId}/${metric}`,
              title: `Zone ${zone.name} - water balance: ${metric}`,
              yLabel: metric,
              series,
            })
          );
        }
        artifacts.push(
          await this.sink.render({
            kind: 'series-panel',
            name: `${unitId}/combined`,
            title: `Water balance - zone ${zone.name}`,
            panels: [...seriesByMetric].map(([label, series]) => ({ label, series })),
          })
        );

        aggregates.push(zoneAggregate);
        zoneSeries.push({ zoneId: zone.name, seriesByMetric });
        return { artifacts };
      });
    }

    await this.unit(manifest, BALANCE_SYSTEM, async () => {
      const artifacts = [
        await this.sink.render({
          kind: 'zone-comparison',
          name: `${BALANCE_SYSTEM}/components`,
          title: 'Mean water balance components by zone',
          metrics: this.options.balanceMetrics,
          zones: aggregates,
        }),
        await this.sink.render({
          kind: 'net-balance',
          name: `${BALANCE_SYSTEM}/net`,
          title: `Net balance by zone (${this.options.balance.inflow} - ${this.options.balance.outflow})`,
          zones: aggregates,
        }),
        await this.sink.render({
          kind: 'series-line',
          name: `${BALANCE_SYSTEM}/net-evolution`,
          title: 'System net balance evolution',
          yLabel: 'Net balance',
          series: systemNetSeries(zoneSeries, this.options.balance),
        }),
      ];
      return { artifacts };
    });
  }

  /**
   * One reconciled series per balance metric whose column appears in either
   * regime. Metrics absent from both are left out of the map.
   */
  private balanceSeries(
    zoneName: string,
    historical: readonly RawSeriesRecord[],
    forecast: readonly RawSeriesRecord[]
  ): Map<string, Series> {
    const seriesByMetric = new Map<string, Series>();

    for (const metric of this.options.balanceMetrics) {
      const field = `value_${metric}`;
      const inHistorical = hasField(historical, field);
      const inForecast = hasField(forecast, field);
      if (!inHistorical && !inForecast) continue;

      const key: SeriesKey = { entityId: zoneName, metric };
      seriesByMetric.set(
        metric,
        reconcile(
          inHistorical ? toTimePoints(historical, field, Regime.HISTORICAL, key) : [],
          inForecast ? toTimePoints(forecast, field, Regime.FORECAST, key) : [],
          key
        )
      );
    }

    return seriesByMetric;
  }

  // ==========================================================================
  // Wells
  // ==========================================================================

  private async runWells(manifest: ManifestBuilder): Promise<void> {
    // Retrieval phase
    const levels = await this.unit(manifest, 'wells/levels', async () => {
      const collection = await this.client.fetch(endpoint('well-levels', {}));
      const { entities, rejected } = wellEntitiesFromFeatures(
        collection.features,
        this.options.wellProperties,
        this.options.wellCrs
      );
      for (const { index, reason } of rejected) {
        log.warn('Well level feature skipped', { index, reason });
      }
      return { value: entities };
    });
    const population = levels ?? [];

    const normalized = await this.unit(manifest, 'wells/zones', async () => {
      const collection = await this.client.fetch(endpoint('zone-geometry', {}));
      const result = normalizeZoneFeatures(collection.features, this.options.zoneCrs);
      for (const failure of result.failures) {
        const failureId = `zone-geometry/${unitSegment(failure.zoneId)}`;
        if (!this.claim(manifest, failureId)) break;
        manifest.failure(failureId, failure.error);
        log.warn('Zone geometry skipped', {
          zone: failure.zoneId,
          error: failure.error.message,
        });
      }
      return { value: result.zones };
    });
    const zones: readonly ZoneGeometry[] = normalized ?? [];

    const wellIds = await this.selectWells(manifest);
    const wells: WellRecord[] = [];
    for (const wellId of wellIds) {
      await this.unit(manifest, wellUnitId(wellId), async () => {
        const record = await this.retrieveWell(wellId);
        if (record.series.points.length === 0) {
          return { noData: true };
        }
        wells.push(record);
        return {};
      });
    }

    if (manifest.isFatal) return;

    // Classification barrier
    const levelsOutcome = manifest.get('wells/levels');
    if (levelsOutcome?.status === 'failure') {
      manifest.setFatal(
        'classification',
        new InsufficientDataError(
          0,
          MIN_DISTINCT_VALUES,
          `wells/levels failed with ${levelsOutcome.kind}: ${levelsOutcome.message}`
        )
      );
      log.error('Well levels unavailable, skipping well rendering', {
        kind: levelsOutcome.kind,
        error: levelsOutcome.message,
      });
      return;
    }

    let classified: SpatialEntity[];
    try {
      classified = classifyEntities(population);
    } catch (error) {
      manifest.setFatal('classification', error);
      log.error('Classification failed, skipping well rendering', {
        kind: errorKind(error),
        error: errorMessage(error),
        population: population.length,
      });
      return;
    }

    const counts = countByClass(classified);
    log.info('Wells classified', { population: classified.length, ...counts });
    const classById = new Map(classified.map((entity) => [entity.id, entity.percentileClass]));

    // Rendering phase
    await this.unit(manifest, 'wells/map', async () => {
      const path = await this.sink.render({
        kind: 'well-map',
        name: 'wells/map',
        title: 'Monitoring wells by level percentile',
        zones,
        wells: classified,
        counts,
      });
      return { artifacts: [path] };
    });

    for (const well of wells) {
      const unitId = wellUnitId(well.id);
      try {
        const path = await this.sink.render({
          kind: 'series-line',
          name: unitId,
          title: wellTitle(well, classById.get(well.id)),
          yLabel: 'Level (m a.s.l.)',
          series: well.series,
        });
        manifest.addArtifacts(unitId, [path]);
      } catch (error) {
        manifest.failAfterSuccess(unitId, error);
        log.warn('Unit failed', { unit: unitId, kind: errorKind(error), error: errorMessage(error) });
      }
    }

    await this.unit(manifest, 'wells/comparison', async () => {
      const series: LabelledSeries[] = wells.map((well) => ({
        label: well.info.punto_monitoreo ?? well.id,
        series: well.series,
      }));
      const path = await this.sink.render({
        kind: 'series-overlay',
        name: 'wells/comparison',
        title: 'Well level comparison',
        yLabel: 'Level (m a.s.l.)',
        series,
      });
      return { artifacts: [path] };
    });
  }

  /**
   * Configured ids, or every well of the well list (deduplicated, in order)
   */
  private async selectWells(manifest: ManifestBuilder): Promise<readonly string[]> {
    if (this.options.wellIds.length > 0) {
      return [...new Set(this.options.wellIds)];
    }

    const ids = await this.unit(manifest, 'wells/list', async () => {
      const items = await this.client.fetch(endpoint('well-list', {}));
      return { value: [...new Set(items.map((item) => item.id))] };
    });
    return ids ?? [];
  }

  /**
   * History and forecast of one well, reconciled. A well the forecast
   * service does not know (404) simply has no forecast.
   */
  private async retrieveWell(wellId: string): Promise<WellRecord> {
    const key: SeriesKey = { entityId: wellId, metric: WELL_METRIC };
    const history = await this.client.fetch(endpoint('well-history', { wellId }));

    let forecastRecords: RawSeriesRecord[] = [];
    try {
      forecastRecords = (await this.client.fetch(endpoint('well-forecast', { wellId }))).records;
    } catch (error) {
      if (!(error instanceof RetrievalError) || error.statusCode !== 404) throw error;
      log.info('No forecast for well', { well: wellId });
    }

    return {
      id: wellId,
      info: history.info,
      series: reconcile(
        toTimePoints(history.records, VALUE_FIELD, Regime.HISTORICAL, key),
        toTimePoints(forecastRecords, VALUE_FIELD, Regime.FORECAST, key),
        key
      ),
    };
  }
}

function wellUnitId(wellId: string): string {
  return `well/${unitSegment(wellId)}`;
}

function wellTitle(well: WellRecord, percentileClass: PercentileClass | undefined): string {
  const station = well.info.punto_monitoreo ? ` (${well.info.punto_monitoreo})` : '';
  const band = percentileClass ? PERCENTILE_CLASS_LABELS[percentileClass] : 'unclassified';
  return `Well ${well.id}${station} - level class ${band}`;
}
