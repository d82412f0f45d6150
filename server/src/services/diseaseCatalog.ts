import type { Disease } from '../../../shared/types';
import { describeError } from '../errors';
import type { DocumentStore, Row } from './documentStore';
import { buildImageUrl, localisedText, readText, readTextList } from './localizedRow';
import type { LocalizationCache } from './localizationCache';

export const DISEASES_TABLE = 'diseases';

const LOCALISED_FIELDS = ['name', 'description', 'symptoms', 'treatment', 'prevention', 'prevalence'] as const;

export interface DiseaseListQuery {
  language: string;
  search?: string | null;
  limit: number;
}

export interface DiseaseCatalogOptions {
  store: DocumentStore;
  cache: LocalizationCache;
  staticUrlBase: string;
}

export class DiseaseCatalog {
  private readonly store: DocumentStore;
  private readonly cache: LocalizationCache;
  private readonly staticUrlBase: string;

  constructor(options: DiseaseCatalogOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.staticUrlBase = options.staticUrlBase;
  }

  /** Matches the search term against names and descriptions in every supported language. */
  async listDiseases(query: DiseaseListQuery): Promise<Disease[]> {
    const search = query.search?.trim();
    try {
      const { rows } = await this.store.openTable(DISEASES_TABLE).query({
        search: search
          ? {
              columns: this.cache.supportedLanguages.flatMap((language) => [
                `name_${language}`,
                `description_${language}`,
              ]),
              term: search,
            }
          : undefined,
        orderBy: [{ column: 'id', ascending: true }],
        limit: Math.max(1, Math.floor(query.limit)),
      });
      return this.toDiseases(rows, query.language);
    } catch (error) {
      console.error(`[diseases] Failed to list diseases: ${describeError(error)}`);
      return [];
    }
  }

  async getDisease(id: string, language: string): Promise<Disease | null> {
    try {
      const { rows } = await this.store.openTable(DISEASES_TABLE).query({ equals: { id }, limit: 1 });
      const row = rows[0];
      return row ? this.toDisease(row, language) : null;
    } catch (error) {
      console.error(`[diseases] Failed to load disease '${id}': ${describeError(error)}`);
      return null;
    }
  }

  async getDiseasesByVector(speciesId: string, language: string): Promise<Disease[]> {
    try {
      const { rows } = await this.store.openTable(DISEASES_TABLE).query({
        contains: { vectors: [speciesId] },
        orderBy: [{ column: 'id', ascending: true }],
      });
      return this.toDiseases(rows, language);
    } catch (error) {
      console.error(`[diseases] Failed to load diseases for vector '${speciesId}': ${describeError(error)}`);
      return [];
    }
  }

  private toDiseases(rows: Row[], language: string): Disease[] {
    return rows
      .map((row) => this.toDisease(row, language))
      .filter((entry): entry is Disease => entry !== null);
  }

  private toDisease(row: Row, language: string): Disease | null {
    const id = readText(row, 'id');
    if (!id) {
      return null;
    }
    const { defaultLanguage } = this.cache;
    const [name, description, symptoms, treatment, prevention, prevalence] = LOCALISED_FIELDS.map((field) =>
      localisedText(row, field, language, defaultLanguage),
    );
    return {
      id,
      name,
      description,
      symptoms,
      treatment,
      prevention,
      prevalence,
      image_url: buildImageUrl(this.staticUrlBase, 'diseases', id, 'detail'),
      vectors: readTextList(row.vectors),
    };
  }
}
