/**
 * Endpoint descriptors
 *
 * Each retrieval is a `{ kind, params }` pair. The kind fixes both the
 * parameter shape and the record type the client resolves to, so callers get
 * the right type back without casting.
 */

import type { z } from 'zod';
import { Regime } from '../core/types.js';
import type { RawSeriesRecord } from '../series/records.js';
import {
  FeatureCollectionSchema,
  WellListSchema,
  WellSeriesSchema,
  ZoneListSchema,
  ZoneSeriesSchema,
  type ListItem,
  type WellSeriesResponse,
} from './schemas.js';

export const DEFAULT_BASE_URL = 'https://hydromet4api.hidrofuturo.cl/api/v1';

/** Datasets served by the heads series endpoints */
export const HEAD_DATASETS = ['head-absoluto', 'head-delta'] as const;

export type SeriesFamily = 'heads' | 'balance';

export type EndpointKind =
  | 'zone-list'
  | 'zone-series'
  | 'zone-geometry'
  | 'well-list'
  | 'well-levels'
  | 'well-history'
  | 'well-forecast';

type NoParams = Record<string, never>;

export type ZoneSeriesParams =
  | { readonly family: 'heads'; readonly dataset: string; readonly zone: string; readonly regime: Regime }
  | { readonly family: 'balance'; readonly zone: string; readonly regime: Regime };

export interface EndpointParams {
  'zone-list': { readonly family: SeriesFamily };
  'zone-series': ZoneSeriesParams;
  'zone-geometry': NoParams;
  'well-list': NoParams;
  'well-levels': NoParams;
  'well-history': { readonly wellId: string };
  'well-forecast': { readonly wellId: string };
}

export type RawFeatureCollection = z.infer<typeof FeatureCollectionSchema>;

export interface RecordsByEndpoint {
  'zone-list': ListItem[];
  'zone-series': RawSeriesRecord[];
  'zone-geometry': RawFeatureCollection;
  'well-list': ListItem[];
  'well-levels': RawFeatureCollection;
  'well-history': WellSeriesResponse;
  'well-forecast': WellSeriesResponse;
}

export interface EndpointDescriptor<K extends EndpointKind = EndpointKind> {
  readonly kind: K;
  readonly params: EndpointParams[K];
}

/**
 * Descriptor constructor, mainly to keep call sites short
 */
export function endpoint<K extends EndpointKind>(
  kind: K,
  params: EndpointParams[K]
): EndpointDescriptor<K> {
  return { kind, params };
}

// ============================================================================
// Paths
// ============================================================================

const REGIME_SUFFIX: Readonly<Record<Regime, string>> = {
  [Regime.HISTORICAL]: 'historico',
  [Regime.FORECAST]: 'modelacion',
};

function withQuery(path: string, query: Record<string, string>): string {
  return `${path}?${new URLSearchParams(query).toString()}`;
}

const PATHS: { readonly [K in EndpointKind]: (params: EndpointParams[K]) => string } = {
  'zone-list': ({ family }) =>
    family === 'heads' ? '/metamodelos/zonas' : '/metamodelos/balance/zones',
  'zone-series': (params) => {
    const suffix = REGIME_SUFFIX[params.regime];
    const path =
      params.family === 'heads'
        ? `/metamodelos/metamodelo-mensual-${encodeURIComponent(params.dataset)}-${suffix}`
        : `/metamodelos/balance/metamodelo-mensual-balance-${suffix}`;
    return withQuery(path, { zona: params.zone });
  },
  'zone-geometry': () => '/metamodelos/metamodelos-zonas-geojson',
  'well-list': () => '/plataforma-pozos/listado-pozos',
  'well-levels': () => '/plataforma-pozos/pozos-nivel-geojson',
  'well-history': ({ wellId }) => `/plataforma-pozos/pozos-data/${encodeURIComponent(wellId)}`,
  'well-forecast': ({ wellId }) => `/salida/pronostico-pozos-data/${encodeURIComponent(wellId)}`,
};

/**
 * Path (with query) of a descriptor, relative to the base URL
 */
export function endpointPath<K extends EndpointKind>(descriptor: EndpointDescriptor<K>): string {
  const build: (params: EndpointParams[K]) => string = PATHS[descriptor.kind];
  return build(descriptor.params);
}

/**
 * Absolute URL of a descriptor
 */
export function endpointUrl<K extends EndpointKind>(
  baseUrl: string,
  descriptor: EndpointDescriptor<K>
): string {
  return `${baseUrl.replace(/\/+$/, '')}${endpointPath(descriptor)}`;
}

// ============================================================================
// Response schemas
// ============================================================================

export const RESPONSE_SCHEMAS: {
  readonly [K in EndpointKind]: z.ZodType<RecordsByEndpoint[K], z.ZodTypeDef, unknown>;
} = {
  'zone-list': ZoneListSchema,
  'zone-series': ZoneSeriesSchema,
  'zone-geometry': FeatureCollectionSchema,
  'well-list': WellListSchema,
  'well-levels': FeatureCollectionSchema,
  'well-history': WellSeriesSchema,
  'well-forecast': WellSeriesSchema,
};
