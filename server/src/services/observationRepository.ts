import { z } from 'zod';
import type { Observation, ObservationListResponse } from '../../../shared/types';
import { StorageWriteFailedError, describeError } from '../errors';
import type { DocumentStore, FieldValue, OrderTerm, Row } from './documentStore';
import { isRow } from './documentStore';
import { parseObservedDate } from './geoFeatureFilter';

export const OBSERVATIONS_TABLE = 'observations';

/** Newest observation day first; the id keeps the order total. */
export const OBSERVATION_ORDER: readonly OrderTerm[] = [
  { column: 'observed_at', ascending: false },
  { column: 'id', ascending: true },
];

const optionalText = z.string().nullish();

export const observationInputSchema = z.object({
  id: z.string().uuid().optional(),
  species_scientific_name: z.string().trim().min(1),
  count: z.number().int().positive(),
  location: z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
  }),
  observed_at: z
    .string()
    .trim()
    .refine((value) => parseObservedDate(value) !== null, {
      message: 'observed_at must start with a YYYY-MM-DD date',
    }),
  notes: optionalText,
  user_id: optionalText,
  location_accuracy_m: z.number().int().nonnegative().nullish(),
  data_source: z.union([z.string(), z.record(z.unknown())]).nullish(),
  image_filename: optionalText,
  model_id: optionalText,
  confidence: z.number().min(0).max(1).nullish(),
  metadata: z.record(z.unknown()).nullish(),
});

export type ObservationInput = z.infer<typeof observationInputSchema>;

const observationRowSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  species_scientific_name: z.string().min(1),
  count: z.number().int().positive(),
  observed_at: z.string().min(1),
  observer_id: optionalText,
  user_id: optionalText,
  notes: optionalText,
  location_accuracy_m: z.number().int().nullish(),
  data_source: optionalText,
  image_filename: optionalText,
  model_id: optionalText,
  confidence: z.number().min(0).max(1).nullish(),
});

export interface ObservationListQuery {
  userId?: string | null;
  speciesId?: string | null;
  limit: number;
  offset: number;
}

function serialiseJsonField(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value);
}

function stripEmptyValues(row: Row): Row {
  return Object.fromEntries(
    Object.entries(row).filter(([, value]) => value !== null && value !== undefined && value !== ''),
  );
}

/** Storage shape of an observation; coordinates are kept in GeoJSON `[lng, lat]` order. */
export function toObservationRow(observation: Observation): Row {
  return stripEmptyValues({
    id: observation.id,
    species_scientific_name: observation.species_scientific_name,
    observed_at: observation.observed_at.split('T')[0],
    count: observation.count,
    observer_id: observation.user_id,
    location_accuracy_m: observation.location_accuracy_m,
    notes: observation.notes,
    data_source: serialiseJsonField(observation.data_source),
    image_filename: observation.image_filename,
    model_id: observation.model_id,
    confidence: observation.confidence,
    geometry_type: 'Point',
    coordinates: [observation.location.lng, observation.location.lat],
    metadata: serialiseJsonField(observation.metadata),
  });
}

function parseCoordinates(value: unknown): [lng: number, lat: number] | null {
  let candidate = value;
  if (typeof candidate === 'string') {
    try {
      candidate = JSON.parse(candidate);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(candidate) || candidate.length !== 2) {
    return null;
  }
  const [lng, lat] = candidate;
  if (typeof lng !== 'number' || typeof lat !== 'number') {
    return null;
  }
  if (!Number.isFinite(lng) || !Number.isFinite(lat) || Math.abs(lng) > 180 || Math.abs(lat) > 90) {
    return null;
  }
  return [lng, lat];
}

function parseMetadata(value: unknown, id: string): Record<string, unknown> {
  if (isRow(value)) {
    return value;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    parsed = null;
  }
  if (isRow(parsed)) {
    return parsed;
  }
  console.warn(`[observations] Could not decode metadata for observation ${id}.`);
  return {};
}

/** Maps one stored row back to an observation, or `null` when the row is unusable. */
export function fromObservationRow(row: Row): Observation | null {
  const parsed = observationRowSchema.safeParse(row);
  if (!parsed.success) {
    console.warn(`[observations] Skipping malformed observation row ${String(row.id ?? '')}.`);
    return null;
  }

  const coordinates = parseCoordinates(row.coordinates);
  if (!coordinates) {
    return null;
  }

  const data = parsed.data;
  return {
    id: data.id,
    species_scientific_name: data.species_scientific_name,
    count: data.count,
    location: { lat: coordinates[1], lng: coordinates[0] },
    observed_at: data.observed_at,
    notes: data.notes ?? null,
    user_id: data.user_id || data.observer_id || null,
    location_accuracy_m: data.location_accuracy_m ?? null,
    data_source: data.data_source ?? null,
    image_filename: data.image_filename ?? null,
    model_id: data.model_id ?? null,
    confidence: data.confidence ?? null,
    metadata: parseMetadata(row.metadata, data.id),
  };
}

export interface ObservationRepositoryOptions {
  store: DocumentStore;
  /** Placeholder user id sent by unauthenticated clients; never used as a filter. */
  anonymousUserId: string;
}

export class ObservationRepository {
  private readonly store: DocumentStore;
  private readonly anonymousUserId: string;

  constructor(options: ObservationRepositoryOptions) {
    this.store = options.store;
    this.anonymousUserId = options.anonymousUserId;
  }

  async create(observation: Observation): Promise<Observation> {
    const row = toObservationRow(observation);
    try {
      await this.store.openTable(OBSERVATIONS_TABLE).insert(row);
    } catch (error) {
      throw new StorageWriteFailedError(
        `Failed to save observation ${observation.id}: ${describeError(error)}`,
        { cause: error },
      );
    }
    return observation;
  }

  async list(query: ObservationListQuery): Promise<ObservationListResponse> {
    const limit = Math.max(1, Math.floor(query.limit));
    const offset = Math.max(0, Math.floor(query.offset));

    const equals: Record<string, FieldValue> = {};
    if (query.userId && query.userId !== this.anonymousUserId) {
      equals.observer_id = query.userId;
    }
    if (query.speciesId) {
      equals.species_scientific_name = query.speciesId;
    }

    try {
      const result = await this.store.openTable(OBSERVATIONS_TABLE).query({
        equals,
        orderBy: OBSERVATION_ORDER,
        range: { offset, limit },
        count: true,
      });

      const observations = result.rows
        .map((row) => fromObservationRow(row))
        .filter((entry): entry is Observation => entry !== null);

      return { count: result.count ?? result.rows.length, observations };
    } catch (error) {
      console.error(`[observations] Failed to list observations: ${describeError(error)}`);
      return { count: 0, observations: [] };
    }
  }
}
