import type { SpeciesDetail, SpeciesSummary } from '../../../shared/types';
import { describeError } from '../errors';
import type { DiseaseCatalog } from './diseaseCatalog';
import type { DocumentStore, Row } from './documentStore';
import { buildImageUrl, localisedList, localisedText, readText, readTextList } from './localizedRow';
import type { LocalizationCache } from './localizationCache';

export const SPECIES_TABLE = 'species';

export const VECTOR_SPECIES_LIMIT = 200;

// Placeholder statuses in the catalog for species that transmit nothing.
const NON_VECTOR_STATUSES = ['None', 'Unknown'];

/**
 * Loads every distinct scientific name, sorted. A failed read yields an empty
 * list so filter options can still be served.
 */
export async function loadSpeciesNames(store: DocumentStore): Promise<string[]> {
  try {
    const { rows } = await store.openTable(SPECIES_TABLE).query({ columns: ['scientific_name'] });
    const names = rows
      .map((row) => readText(row, 'scientific_name'))
      .filter((name): name is string => name !== null);
    return [...new Set(names)].sort();
  } catch (error) {
    console.error(`[species] Failed to load species names: ${describeError(error)}`);
    return [];
  }
}

export interface SpeciesListQuery {
  language: string;
  search?: string | null;
  limit: number;
}

export interface VectorSpeciesQuery {
  language: string;
  diseaseId?: string | null;
}

export interface SpeciesCatalogOptions {
  store: DocumentStore;
  cache: LocalizationCache;
  diseases: DiseaseCatalog;
  staticUrlBase: string;
}

export class SpeciesCatalog {
  private readonly store: DocumentStore;
  private readonly cache: LocalizationCache;
  private readonly diseases: DiseaseCatalog;
  private readonly staticUrlBase: string;

  constructor(options: SpeciesCatalogOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.diseases = options.diseases;
    this.staticUrlBase = options.staticUrlBase;
  }

  async listSpecies(query: SpeciesListQuery): Promise<SpeciesSummary[]> {
    const search = query.search?.trim();
    try {
      const { rows } = await this.store.openTable(SPECIES_TABLE).query({
        search: search
          ? {
              columns: [
                'scientific_name',
                ...this.cache.supportedLanguages.map((language) => `common_name_${language}`),
              ],
              term: search,
            }
          : undefined,
        orderBy: [{ column: 'scientific_name', ascending: true }],
        limit: Math.max(1, Math.floor(query.limit)),
      });

      return this.toSummaries(rows, query.language);
    } catch (error) {
      console.error(`[species] Failed to list species: ${describeError(error)}`);
      return [];
    }
  }

  /**
   * Species that transmit a disease. With a disease id, the disease's vector
   * list decides; without one, every species with a real vector status.
   */
  async getVectorSpecies(query: VectorSpeciesQuery): Promise<SpeciesSummary[]> {
    let vectorIds: string[] | null = null;
    if (query.diseaseId) {
      const disease = await this.diseases.getDisease(query.diseaseId, query.language);
      if (!disease || disease.vectors.length === 0) {
        return [];
      }
      vectorIds = disease.vectors;
    }

    try {
      const { rows } = await this.store.openTable(SPECIES_TABLE).query({
        within: vectorIds ? { id: vectorIds } : undefined,
        excluding: vectorIds ? undefined : { vector_status: NON_VECTOR_STATUSES },
        orderBy: [{ column: 'scientific_name', ascending: true }],
        limit: VECTOR_SPECIES_LIMIT,
      });
      return this.toSummaries(rows, query.language);
    } catch (error) {
      console.error(`[species] Failed to list vector species: ${describeError(error)}`);
      return [];
    }
  }

  async getSpecies(id: string, language: string): Promise<SpeciesDetail | null> {
    try {
      const { rows } = await this.store.openTable(SPECIES_TABLE).query({ equals: { id }, limit: 1 });
      const row = rows[0];
      if (!row) {
        return null;
      }
      const summary = this.toSummary(row, language);
      if (!summary) {
        return null;
      }

      const { defaultLanguage } = this.cache;
      const regionIds = readTextList(row.geographic_regions);
      const regionsLoaded = this.cache.isLoaded('region');
      return {
        ...summary,
        image_url: buildImageUrl(this.staticUrlBase, 'species', summary.id, 'detail'),
        description: localisedText(row, 'description', language, defaultLanguage),
        key_characteristics: localisedList(row, 'key_characteristics', language, defaultLanguage),
        habitat_preferences: localisedList(row, 'habitat_preferences', language, defaultLanguage),
        geographic_regions: regionIds.map((regionId) =>
          regionsLoaded ? this.cache.resolve('region', language, regionId) : regionId,
        ),
        related_diseases: readTextList(row.related_diseases),
      };
    } catch (error) {
      console.error(`[species] Failed to load species '${id}': ${describeError(error)}`);
      return null;
    }
  }

  private toSummaries(rows: Row[], language: string): SpeciesSummary[] {
    return rows
      .map((row) => this.toSummary(row, language))
      .filter((entry): entry is SpeciesSummary => entry !== null);
  }

  private toSummary(row: Row, language: string): SpeciesSummary | null {
    const id = readText(row, 'id');
    const scientificName = readText(row, 'scientific_name');
    if (!id || !scientificName) {
      return null;
    }
    return {
      id,
      scientific_name: scientificName,
      common_name: localisedText(row, 'common_name', language, this.cache.defaultLanguage),
      vector_status: readText(row, 'vector_status'),
      image_url: buildImageUrl(this.staticUrlBase, 'species', id, 'thumbnail'),
    };
  }
}
