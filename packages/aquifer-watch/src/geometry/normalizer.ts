/**
 * Geometry Normalizer
 *
 * Turns Polygon / MultiPolygon records in a projected CRS into the tagged
 * {@link NormalizedGeometry} variant in WGS84 degrees.
 *
 * LIMITATIONS:
 * - Only outer rings are kept. Holes are dropped; zones are drawn as
 *   backdrop and never used for containment.
 * - A single bad vertex fails the whole geometry. There is no repair and no
 *   interpolation.
 */

import { featureCollection, multiPolygon, polygon, bbox } from '@turf/turf';
import type { BBox, Feature, MultiPolygon, Polygon, Position } from 'geojson';
import type { LonLat, NormalizedGeometry, Ring, ZoneGeometry } from '../core/types.js';
import { GeometryError } from '../core/errors.js';
import { describeValue, isPolygonShape, isPositionLike, isRecord } from '../core/type-guards.js';
import { createTransform, type PointTransform } from './crs.js';

/** Minimum distinct vertices of a ring, closing vertex excluded */
export const MIN_RING_VERTICES = 3;

/**
 * Normalize one Polygon or MultiPolygon record
 *
 * @param raw - GeoJSON-like geometry as received
 * @param sourceCrs - CRS of `raw` (e.g. `EPSG:32719`)
 * @param featureId - Used in error messages
 * @throws {GeometryError} Wrong shape, degenerate ring, non-finite or untransformable vertex
 */
export function normalizeGeometry(
  raw: unknown,
  sourceCrs: string,
  featureId?: string
): NormalizedGeometry {
  if (!isPolygonShape(raw)) {
    throw new GeometryError(
      `Expected Polygon or MultiPolygon, got ${describeValue(raw)}`,
      featureId
    );
  }

  const transform = createTransform(sourceCrs);

  if (raw.type === 'Polygon') {
    return Object.freeze({
      kind: 'single',
      ring: normalizeOuterRing(raw.coordinates, transform, featureId),
    });
  }

  if (raw.coordinates.length === 0) {
    throw new GeometryError('MultiPolygon has no polygons', featureId);
  }

  const rings = raw.coordinates.map((part, index) => {
    if (!Array.isArray(part)) {
      throw new GeometryError(`MultiPolygon part ${index} is not a polygon`, featureId);
    }
    return normalizeOuterRing(part, transform, featureId);
  });

  return Object.freeze({ kind: 'multi', rings: Object.freeze(rings) });
}

/**
 * Outer rings of a normalized geometry, in order
 */
export function ringsOf(geometry: NormalizedGeometry): readonly Ring[] {
  return geometry.kind === 'single' ? [geometry.ring] : geometry.rings;
}

function normalizeOuterRing(
  polygonRings: readonly unknown[],
  transform: PointTransform,
  featureId: string | undefined
): Ring {
  const outer = polygonRings[0];
  if (!Array.isArray(outer)) {
    throw new GeometryError('Polygon has no outer ring', featureId);
  }

  const vertices = readVertices(outer, featureId);
  const open = dropClosingVertex(vertices);

  const distinct = new Set(open.map(([x, y]) => `${x},${y}`)).size;
  if (distinct < MIN_RING_VERTICES) {
    throw new GeometryError(
      `Ring has ${distinct} distinct vertices, at least ${MIN_RING_VERTICES} required`,
      featureId
    );
  }

  return Object.freeze(open.map(([x, y]) => Object.freeze(transform(x, y))));
}

function readVertices(ring: readonly unknown[], featureId: string | undefined): LonLat[] {
  return ring.map((vertex, index): LonLat => {
    if (!isPositionLike(vertex)) {
      throw new GeometryError(`Vertex ${index} is not a coordinate pair`, featureId);
    }
    const [x, y] = vertex;
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new GeometryError(`Vertex ${index} has non-finite coordinates`, featureId);
    }
    return [x, y];
  });
}

function dropClosingVertex(vertices: LonLat[]): LonLat[] {
  const first = vertices[0];
  const last = vertices[vertices.length - 1];
  if (vertices.length > 1 && first && last && first[0] === last[0] && first[1] === last[1]) {
    return vertices.slice(0, -1);
  }
  return vertices;
}

// ============================================================================
// Zone collections
// ============================================================================

/**
 * Feature as delivered by the zone geometry endpoint
 */
export interface RawZoneFeature {
  readonly geometry?: unknown;
  readonly properties?: Readonly<Record<string, unknown>> | null;
}

export interface ZoneGeometryFailure {
  readonly zoneId: string;
  readonly error: GeometryError;
}

export interface ZoneNormalizationResult {
  readonly zones: readonly ZoneGeometry[];
  readonly failures: readonly ZoneGeometryFailure[];
}

/**
 * Normalize every zone feature independently
 *
 * A feature that fails is reported in `failures`; the others are kept.
 *
 * @param nameProperty - Property holding the zone name (upstream uses `zona`)
 */
export function normalizeZoneFeatures(
  features: readonly RawZoneFeature[],
  sourceCrs: string,
  nameProperty = 'zona'
): ZoneNormalizationResult {
  const zones: ZoneGeometry[] = [];
  const failures: ZoneGeometryFailure[] = [];

  features.forEach((feature, index) => {
    const zoneId = zoneName(feature, nameProperty) ?? `zone-${index + 1}`;
    try {
      zones.push({ zoneId, geometry: normalizeGeometry(feature.geometry, sourceCrs, zoneId) });
    } catch (error) {
      if (!(error instanceof GeometryError)) throw error;
      failures.push({ zoneId, error });
    }
  });

  return { zones, failures };
}

function zoneName(feature: RawZoneFeature, nameProperty: string): string | undefined {
  const properties = feature.properties;
  if (!isRecord(properties)) return undefined;
  const value = properties[nameProperty];
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

// ============================================================================
// GeoJSON output
// ============================================================================

function closeRing(ring: Ring): Position[] {
  const positions = ring.map(([lon, lat]) => [lon, lat]);
  const first = ring[0];
  if (first) positions.push([first[0], first[1]]);
  return positions;
}

/**
 * Closed GeoJSON feature for a normalized geometry
 */
export function toGeoJSON(
  geometry: NormalizedGeometry,
  properties: Record<string, unknown> = {}
): Feature<Polygon | MultiPolygon> {
  if (geometry.kind === 'single') {
    return polygon([closeRing(geometry.ring)], properties);
  }
  return multiPolygon(
    geometry.rings.map((ring) => [closeRing(ring)]),
    properties
  );
}

/**
 * Bounding box of a set of geometries, null for an empty set
 */
export function geometryBounds(geometries: readonly NormalizedGeometry[]): BBox | null {
  if (geometries.length === 0) return null;
  return bbox(featureCollection(geometries.map((geometry) => toGeoJSON(geometry))));
}
