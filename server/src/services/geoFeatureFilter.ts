import { z } from 'zod';
import type { Geometry } from 'geojson';
import type { GeoFeature, GeoFeatureProperties } from '../../../shared/types';
import { isRow, type Row } from './documentStore';

export type BoundingBox = readonly [minLon: number, minLat: number, maxLon: number, maxLat: number];

export interface GeoFeaturePredicates {
  species?: readonly string[] | null;
  bbox?: BoundingBox | null;
  startDate?: string | null;
  endDate?: string | null;
}

const GEOMETRY_COLUMNS = new Set(['geometry', 'geometry_type', 'coordinates']);

// Observer identities stay out of the public map layers.
const PRIVATE_COLUMNS = new Set(['observer_id', 'user_id']);

const coordinateSchema = z.number().finite();
const positionSchema = z.union([
  z.tuple([coordinateSchema, coordinateSchema]),
  z.tuple([coordinateSchema, coordinateSchema, coordinateSchema]),
]);
const lineSchema = z.array(positionSchema);
const ringsSchema = z.array(lineSchema);

const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Point'), coordinates: positionSchema }),
  z.object({ type: z.literal('MultiPoint'), coordinates: lineSchema }),
  z.object({ type: z.literal('LineString'), coordinates: lineSchema }),
  z.object({ type: z.literal('MultiLineString'), coordinates: ringsSchema }),
  z.object({ type: z.literal('Polygon'), coordinates: ringsSchema }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(ringsSchema) }),
]);

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Strict `YYYY-MM-DD` check, rejecting dates such as 2023-02-30. */
export function isValidDateString(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(0);
  // setUTCFullYear keeps years 0-99 as written; Date.UTC would shift them to 19xx.
  parsed.setUTCFullYear(year, month - 1, day);
  return (
    parsed.getUTCFullYear() === year && parsed.getUTCMonth() === month - 1 && parsed.getUTCDate() === day
  );
}

/** Calendar date of an `observed_at` value; a trailing time part is ignored. */
export function parseObservedDate(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const datePart = value.trim().split('T')[0];
  return isValidDateString(datePart) ? datePart : null;
}

export function parseBbox(value: string | null | undefined): BoundingBox | null {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const parts = value.split(',').map((part) => part.trim());
  if (parts.length !== 4 || parts.some((part) => part === '')) {
    return null;
  }
  const numbers = parts.map(Number);
  if (numbers.some((entry) => !Number.isFinite(entry))) {
    return null;
  }
  const [minLon, minLat, maxLon, maxLat] = numbers;
  return [minLon, minLat, maxLon, maxLat];
}

export function parseSpeciesList(value: string | null | undefined): string[] {
  if (typeof value !== 'string') {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function parseMaybeJson(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

function decodeGeometry(row: Row): Geometry | null {
  const serialised = parseMaybeJson(row.geometry);
  const candidate = isRow(serialised)
    ? serialised
    : {
        type: typeof row.geometry_type === 'string' ? row.geometry_type : 'Point',
        coordinates: parseMaybeJson(row.coordinates),
      };

  const parsed = geometrySchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

function decodeId(value: unknown): string | null {
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function decodeProperties(row: Row): GeoFeatureProperties {
  const properties: GeoFeatureProperties = {};
  Object.entries(row).forEach(([key, value]) => {
    if (!GEOMETRY_COLUMNS.has(key) && !PRIVATE_COLUMNS.has(key)) {
      properties[key] = value;
    }
  });

  if (!('species' in properties) && 'species_scientific_name' in row) {
    const species = row.species_scientific_name;
    properties.species = typeof species === 'string' ? species : null;
  }

  return properties;
}

/** Decodes one store row, or returns `null` when it has no id or no usable geometry. */
export function toGeoFeature(row: unknown): GeoFeature | null {
  if (!isRow(row)) {
    return null;
  }
  const id = decodeId(row.id);
  const geometry = decodeGeometry(row);
  if (!id || !geometry) {
    return null;
  }
  return {
    type: 'Feature',
    id,
    properties: decodeProperties(row),
    geometry,
  };
}

function matchesSpecies(feature: GeoFeature, species: ReadonlySet<string>): boolean {
  const value = feature.properties.species;
  return typeof value === 'string' && species.has(value);
}

function matchesBbox(feature: GeoFeature, bbox: BoundingBox): boolean {
  if (feature.geometry.type !== 'Point') {
    return false;
  }
  const [lon, lat] = feature.geometry.coordinates;
  const [minLon, minLat, maxLon, maxLat] = bbox;
  return lon >= minLon && lon <= maxLon && lat >= minLat && lat <= maxLat;
}

function matchesDateRange(feature: GeoFeature, startDate: string | null, endDate: string | null): boolean {
  const observed = parseObservedDate(feature.properties.observed_at);
  if (!observed) {
    return false;
  }
  // Validated YYYY-MM-DD strings order the same way as the dates they name.
  if (startDate && observed < startDate) {
    return false;
  }
  return !(endDate && observed > endDate);
}

/**
 * Decodes raw rows and keeps the features that satisfy every supplied
 * predicate. Input order is preserved; undecodable rows are dropped.
 */
export function filterGeoFeatures(rows: readonly unknown[], predicates: GeoFeaturePredicates = {}): GeoFeature[] {
  const species = predicates.species?.length ? new Set(predicates.species) : null;
  const bbox = predicates.bbox ?? null;
  const startDate = isValidDateString(predicates.startDate) ? predicates.startDate : null;
  const endDate = isValidDateString(predicates.endDate) ? predicates.endDate : null;
  const hasDateFilter = startDate !== null || endDate !== null;

  const features: GeoFeature[] = [];
  for (const row of rows) {
    const feature = toGeoFeature(row);
    if (!feature) {
      continue;
    }
    if (species && !matchesSpecies(feature, species)) {
      continue;
    }
    if (bbox && !matchesBbox(feature, bbox)) {
      continue;
    }
    if (hasDateFilter && !matchesDateRange(feature, startDate, endDate)) {
      continue;
    }
    features.push(feature);
  }
  return features;
}
