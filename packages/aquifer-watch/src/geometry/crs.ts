/**
 * Coordinate reference systems
 *
 * Zone polygons arrive in a projected UTM system; wells and rendering use
 * WGS84 longitude/latitude. Conversion is point-wise and stateless.
 */

import proj4 from 'proj4';
import type { LonLat } from '../core/types.js';
import { GeometryError } from '../core/errors.js';

export const WGS84 = 'EPSG:4326';

/**
 * Named projections registered with proj4 at load time
 */
const CRS_DEFINITIONS: Readonly<Record<string, string>> = {
  // WGS 84 / UTM zone 19S (upstream zone polygons)
  'EPSG:32719': '+proj=utm +zone=19 +south +datum=WGS84 +units=m +no_defs',
  // WGS 84 / UTM zone 18S
  'EPSG:32718': '+proj=utm +zone=18 +south +datum=WGS84 +units=m +no_defs',
};

for (const [name, definition] of Object.entries(CRS_DEFINITIONS)) {
  proj4.defs(name, definition);
}

/**
 * Converts one source vertex to [lon, lat]
 *
 * @throws {GeometryError} When the vertex cannot be transformed to finite degrees
 */
export type PointTransform = (x: number, y: number) => LonLat;

const NAMED_CRS = /^[A-Za-z]+:\d+$/;

/**
 * Whether `crs` is a registered name or an inline proj4/WKT definition
 */
export function isSupportedCrs(crs: string): boolean {
  if (crs === WGS84) return true;
  if (NAMED_CRS.test(crs)) return crs.toUpperCase() in CRS_DEFINITIONS;
  return crs.trim().startsWith('+proj') || /^(PROJCS|GEOGCS)\[/.test(crs.trim());
}

/**
 * Build a transform from `sourceCrs` to WGS84
 *
 * @param sourceCrs - `EPSG:<code>` name or a proj4 definition string
 * @throws {GeometryError} For an unknown or unparsable CRS
 */
export function createTransform(sourceCrs: string): PointTransform {
  if (sourceCrs === WGS84) {
    return (x, y) => [x, y];
  }

  if (!isSupportedCrs(sourceCrs)) {
    throw new GeometryError(`Unsupported coordinate reference system: ${sourceCrs}`);
  }

  const source = NAMED_CRS.test(sourceCrs) ? sourceCrs.toUpperCase() : sourceCrs;

  const converter = buildConverter(source);

  return (x, y) => {
    const [lon, lat] = forwardVertex(converter, x, y);
    if (lon === undefined || lat === undefined || !Number.isFinite(lon) || !Number.isFinite(lat)) {
      throw new GeometryError(`Transform produced non-finite coordinates for vertex (${x}, ${y})`);
    }
    return [lon, lat];
  };
}

function buildConverter(source: string) {
  try {
    return proj4(source, WGS84);
  } catch (error) {
    throw new GeometryError(`Cannot parse coordinate reference system: ${source}`, undefined, {
      cause: error,
    });
  }
}

function forwardVertex(
  converter: ReturnType<typeof buildConverter>,
  x: number,
  y: number
): readonly (number | undefined)[] {
  try {
    return converter.forward([x, y]);
  } catch (error) {
    throw new GeometryError(`Transform failed for vertex (${x}, ${y})`, undefined, {
      cause: error,
    });
  }
}
