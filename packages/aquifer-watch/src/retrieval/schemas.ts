/**
 * Upstream response schemas
 *
 * The hydrogeological service answers JSON whose exact shape varies by
 * endpoint. Everything the pipeline reads is checked here; unknown extra
 * fields pass through untouched.
 */

import { z } from 'zod';
import type { RawSeriesRecord } from '../series/records.js';

// ============================================================================
// Lists
// ============================================================================

/**
 * Zone and well lists hold either bare ids or `{ id?, nombre? }` objects
 */
export const ListEntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      id: z.union([z.string(), z.number()]).optional(),
      nombre: z.string().optional(),
    })
    .passthrough()
    .refine((entry) => entry.id !== undefined || entry.nombre !== undefined, {
      message: 'List entry needs an id or a nombre',
    }),
]);

export type ListEntry = z.infer<typeof ListEntrySchema>;

/**
 * Normalized list entry: `id` is what the series endpoints expect,
 * `name` is what charts and unit ids use
 */
export interface ListItem {
  readonly id: string;
  readonly name: string;
}

export function toListItem(entry: ListEntry): ListItem {
  if (typeof entry === 'string') {
    return { id: entry, name: entry };
  }
  const id = entry.id !== undefined ? String(entry.id) : entry.nombre ?? '';
  return { id, name: entry.nombre ?? id };
}

export const ZoneListSchema = z.array(ListEntrySchema).transform((entries) => entries.map(toListItem));

export const WellListSchema = z
  .object({ pozos: z.array(ListEntrySchema) })
  .passthrough()
  .transform((body) => body.pozos.map(toListItem));

// ============================================================================
// Time Series
// ============================================================================

export const SeriesRecordSchema = z
  .object({ date: z.string().min(1) })
  .passthrough();

/**
 * `{ data: [{ date, ... }] }` as returned by the zone series endpoints
 */
export const ZoneSeriesSchema = z
  .object({ data: z.array(SeriesRecordSchema) })
  .passthrough()
  .transform((body): RawSeriesRecord[] => body.data);

/**
 * Descriptive metadata of a well (any subset may be missing)
 */
export const WellInfoSchema = z
  .object({
    punto_monitoreo: z.string().optional(),
    tipo_nivel: z.string().optional(),
    latitude: z.number().optional(),
    longitude: z.number().optional(),
  })
  .passthrough();

export type WellInfo = z.infer<typeof WellInfoSchema>;

export const WellSeriesSchema = z
  .object({
    info: WellInfoSchema.optional(),
    data: z.array(SeriesRecordSchema),
  })
  .passthrough()
  .transform((body): WellSeriesResponse => ({ info: body.info ?? {}, records: body.data }));

export interface WellSeriesResponse {
  readonly info: WellInfo;
  readonly records: RawSeriesRecord[];
}

// ============================================================================
// GeoJSON
// ============================================================================

const FeatureSchema = z
  .object({
    type: z.literal('Feature'),
    geometry: z.unknown(),
    properties: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export const FeatureCollectionSchema = z
  .object({
    type: z.literal('FeatureCollection'),
    features: z.array(FeatureSchema),
  })
  .passthrough();

export type RawFeature = z.infer<typeof FeatureSchema>;
