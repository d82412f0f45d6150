import type { GeoFeatureCollection } from '../../../shared/types';
import { describeError } from '../errors';
import type { DocumentStore } from './documentStore';
import { filterGeoFeatures, type BoundingBox } from './geoFeatureFilter';
import { OBSERVATIONS_TABLE, OBSERVATION_ORDER } from './observationRepository';

export const GEO_LAYER_TYPES = ['distribution', 'observations', 'modeled', 'breeding_sites'] as const;

export type GeoLayerType = (typeof GEO_LAYER_TYPES)[number];

export function isGeoLayerType(value: string): value is GeoLayerType {
  return GEO_LAYER_TYPES.some((layerType) => layerType === value);
}

export interface GeoLayerQuery {
  species?: readonly string[] | null;
  bbox?: BoundingBox | null;
  startDate?: string | null;
  endDate?: string | null;
  limit?: number;
}

export interface GeoLayerServiceOptions {
  store: DocumentStore;
  defaultLimit: number;
}

export function emptyFeatureCollection(): GeoFeatureCollection {
  return { type: 'FeatureCollection', features: [] };
}

export class GeoLayerService {
  private readonly store: DocumentStore;
  private readonly defaultLimit: number;

  constructor(options: GeoLayerServiceOptions) {
    this.store = options.store;
    this.defaultLimit = options.defaultLimit;
  }

  async getGeoLayer(layerType: GeoLayerType, query: GeoLayerQuery = {}): Promise<GeoFeatureCollection> {
    // Only observation points are stored so far.
    if (layerType !== 'observations') {
      return emptyFeatureCollection();
    }

    const species = query.species?.filter(Boolean) ?? [];
    const limit = query.limit && query.limit > 0 ? Math.floor(query.limit) : this.defaultLimit;

    try {
      const { rows } = await this.store.openTable(OBSERVATIONS_TABLE).query({
        within: species.length ? { species_scientific_name: species } : undefined,
        orderBy: OBSERVATION_ORDER,
        limit,
      });

      return {
        type: 'FeatureCollection',
        features: filterGeoFeatures(rows, {
          species,
          bbox: query.bbox,
          startDate: query.startDate,
          endDate: query.endDate,
        }),
      };
    } catch (error) {
      console.error(`[geo] Failed to load '${layerType}' layer: ${describeError(error)}`);
      return emptyFeatureCollection();
    }
  }
}
