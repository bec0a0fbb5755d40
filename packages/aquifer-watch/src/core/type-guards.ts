/**
 * Type Guards for Aquifer Watch
 *
 * Runtime narrowing for values that arrive untyped from the upstream
 * service. All narrowing goes through `is` predicates; nothing is cast.
 */

/**
 * Plain object with string keys
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Number that is neither NaN nor infinite
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * GeoJSON-like Polygon or MultiPolygon record
 *
 * Only checks the discriminant and that `coordinates` is an array; ring
 * contents are validated by the geometry normalizer.
 */
export function isPolygonShape(
  geom: unknown
): geom is { type: 'Polygon' | 'MultiPolygon'; coordinates: unknown[] } {
  if (!isRecord(geom)) return false;
  if (geom.type !== 'Polygon' && geom.type !== 'MultiPolygon') return false;
  return Array.isArray(geom.coordinates);
}

/**
 * Position with at least two numeric components
 *
 * Components may still be non-finite; callers decide how to report that.
 */
export function isPositionLike(value: unknown): value is [number, number, ...number[]] {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  );
}

/**
 * Describe an unknown value for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isRecord(value) && typeof value.type === 'string') return value.type;
  return typeof value;
}
