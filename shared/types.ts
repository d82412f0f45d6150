import type { Feature, FeatureCollection, Geometry } from 'geojson';

export type CacheDomain = 'region' | 'data_source';

export interface LocationPoint {
  lat: number;
  lng: number;
}

export type DataSourceValue = string | Record<string, unknown>;

export interface Observation {
  id: string;
  species_scientific_name: string;
  count: number;
  location: LocationPoint;
  observed_at: string;
  notes?: string | null;
  user_id?: string | null;
  location_accuracy_m?: number | null;
  data_source?: DataSourceValue | null;
  image_filename?: string | null;
  model_id?: string | null;
  confidence?: number | null;
  metadata?: Record<string, unknown> | null;
}

export interface ObservationListResponse {
  count: number;
  observations: Observation[];
}

export interface FilterOption {
  id: string;
  name: string;
}

export interface FilterOptions {
  species: string[];
  regions: FilterOption[];
  data_sources: FilterOption[];
}

/** Always carries `species` and `observed_at` when the source row has them. */
export type GeoFeatureProperties = Record<string, unknown>;

export type GeoFeature = Feature<Geometry, GeoFeatureProperties> & { id: string };

export type GeoFeatureCollection = FeatureCollection<Geometry, GeoFeatureProperties>;

export interface SpeciesSummary {
  id: string;
  scientific_name: string;
  common_name: string | null;
  vector_status: string | null;
  image_url: string;
}

export interface SpeciesDetail extends SpeciesSummary {
  description: string | null;
  key_characteristics: string[];
  habitat_preferences: string[];
  geographic_regions: string[];
  related_diseases: string[];
}

export interface SpeciesListResponse {
  count: number;
  species: SpeciesSummary[];
}

export interface Disease {
  id: string;
  name: string | null;
  description: string | null;
  symptoms: string | null;
  treatment: string | null;
  prevention: string | null;
  prevalence: string | null;
  image_url: string;
  /** Species ids of the mosquitoes that transmit the disease. */
  vectors: string[];
}

export interface DiseaseListResponse {
  count: number;
  diseases: Disease[];
}
