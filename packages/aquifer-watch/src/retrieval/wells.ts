/**
 * Well level features -> SpatialEntity
 *
 * The level endpoint returns a GeoJSON FeatureCollection of Points, WGS84
 * unless configured otherwise.
 * Which property holds the well id and which holds the level is
 * configuration. Features that cannot yield a usable entity are returned as
 * rejections so the caller can log them; they never reach classification.
 */

import type { LonLat, SpatialEntity } from '../core/types.js';
import { GeometryError } from '../core/errors.js';
import { isFiniteNumber, isPositionLike, isRecord } from '../core/type-guards.js';
import { WGS84, createTransform } from '../geometry/crs.js';
import type { RawFeature } from './schemas.js';

export interface WellPropertyNames {
  /** Property holding the well id */
  readonly id: string;
  /** Property holding the measured level */
  readonly value: string;
}

export const DEFAULT_WELL_PROPERTIES: WellPropertyNames = { id: 'id', value: 'value' };

export interface RejectedFeature {
  readonly index: number;
  readonly reason: string;
}

export interface WellEntities {
  readonly entities: readonly SpatialEntity[];
  readonly rejected: readonly RejectedFeature[];
}

/**
 * Build one entity per usable Point feature
 *
 * A feature is rejected when its geometry is not a Point with finite
 * coordinates, its id is missing, its value is not a finite number, or an
 * earlier feature already used the same id. Points outside WGS84 are
 * converted; a point that fails conversion is rejected too.
 *
 * @throws {GeometryError} When `sourceCrs` itself is unsupported
 */
export function wellEntitiesFromFeatures(
  features: readonly RawFeature[],
  properties: WellPropertyNames = DEFAULT_WELL_PROPERTIES,
  sourceCrs: string = WGS84
): WellEntities {
  const transform = createTransform(sourceCrs);
  const entities: SpatialEntity[] = [];
  const rejected: RejectedFeature[] = [];
  const seen = new Set<string>();

  features.forEach((feature, index) => {
    const reject = (reason: string): void => {
      rejected.push({ index, reason });
    };

    const geometry = feature.geometry;
    if (!isRecord(geometry) || geometry.type !== 'Point' || !isPositionLike(geometry.coordinates)) {
      reject('geometry is not a Point');
      return;
    }
    const [x, y] = geometry.coordinates;
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      reject('coordinates are not finite');
      return;
    }

    const props: Record<string, unknown> = feature.properties ?? {};
    const rawId = props[properties.id];
    const id = typeof rawId === 'string' ? rawId.trim() : isFiniteNumber(rawId) ? String(rawId) : '';
    if (id.length === 0) {
      reject(`missing "${properties.id}" property`);
      return;
    }
    if (seen.has(id)) {
      reject(`duplicate well id ${id}`);
      return;
    }

    const value = props[properties.value];
    if (!isFiniteNumber(value)) {
      reject(`"${properties.value}" of ${id} is not a finite number`);
      return;
    }

    let coordinate: LonLat;
    try {
      coordinate = Object.freeze(transform(x, y));
    } catch (error) {
      if (!(error instanceof GeometryError)) throw error;
      reject(error.message);
      return;
    }

    seen.add(id);
    entities.push(Object.freeze({ id, coordinate, value }));
  });

  return { entities, rejected };
}
