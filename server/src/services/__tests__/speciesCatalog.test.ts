import { beforeEach, describe, expect, it, vi } from 'vitest';

import { DiseaseCatalog } from '../diseaseCatalog';
import { LocalizationCache } from '../localizationCache';
import { SpeciesCatalog, loadSpeciesNames } from '../speciesCatalog';
import { FakeDocumentStore } from './fakeDocumentStore';

const STATIC_URL_BASE = 'https://cdn.test';

function createStore(): FakeDocumentStore {
  return new FakeDocumentStore({
    regions: [{ id: 'z_region', name_en: 'Alpha', name_ru: 'Альфа' }],
    species: [
      {
        id: 'sp-1',
        scientific_name: 'Culex pipiens',
        common_name_en: 'Common house mosquito',
        common_name_ru: 'Комар обыкновенный',
        vector_status: 'high',
        description_en: 'Breeds in standing water.',
        key_characteristics_en: ['Brown body', 'Night biter'],
        key_characteristics_ru: ['Коричневое тело'],
        habitat_preferences_en: ['Urban drains'],
        geographic_regions: ['z_region', 'unknown_region'],
        related_diseases: ['west_nile'],
      },
      {
        id: 'sp-2',
        scientific_name: 'Aedes aegypti',
        common_name_en: 'Yellow fever mosquito',
        vector_status: 'Unknown',
      },
      { id: 'sp-3', scientific_name: '  ' },
      { id: 'sp-4', scientific_name: 'Anopheles gambiae', vector_status: 'primary' },
      { id: 'sp-5', scientific_name: 'Toxorhynchites rutilus' },
    ],
    diseases: [
      { id: 'west_nile', name_en: 'West Nile fever', vectors: ['sp-1', 'sp-4'] },
      { id: 'no_vectors', name_en: 'Unassigned', vectors: [] },
    ],
  });
}

describe('loadSpeciesNames', () => {
  it('returns distinct names in order', async () => {
    const store = new FakeDocumentStore({
      species: [
        { scientific_name: 'Culex pipiens' },
        { scientific_name: 'Aedes aegypti' },
        { scientific_name: 'Culex pipiens' },
        { scientific_name: '' },
      ],
    });

    await expect(loadSpeciesNames(store)).resolves.toEqual(['Aedes aegypti', 'Culex pipiens']);
    expect(store.queries[0].options.columns).toEqual(['scientific_name']);
  });

  it('returns an empty list when the store fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const store = new FakeDocumentStore();
    store.failingTables.add('species');

    await expect(loadSpeciesNames(store)).resolves.toEqual([]);
  });
});

describe('SpeciesCatalog', () => {
  let store: FakeDocumentStore;
  let cache: LocalizationCache;
  let catalog: SpeciesCatalog;

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    store = createStore();
    cache = new LocalizationCache({ store, defaultLanguage: 'en', supportedLanguages: ['en', 'ru'] });
    const diseases = new DiseaseCatalog({ store, cache, staticUrlBase: STATIC_URL_BASE });
    catalog = new SpeciesCatalog({ store, cache, diseases, staticUrlBase: STATIC_URL_BASE });
  });

  it('lists species by scientific name with localized common names', async () => {
    const species = await catalog.listSpecies({ language: 'ru', limit: 3 });

    expect(species).toEqual([
      {
        id: 'sp-2',
        scientific_name: 'Aedes aegypti',
        common_name: 'Yellow fever mosquito',
        vector_status: 'Unknown',
        image_url: 'https://cdn.test/static/images/species/sp-2/thumbnail.jpg',
      },
      {
        id: 'sp-4',
        scientific_name: 'Anopheles gambiae',
        common_name: null,
        vector_status: 'primary',
        image_url: 'https://cdn.test/static/images/species/sp-4/thumbnail.jpg',
      },
    ]);
  });

  it('searches scientific and common names', async () => {
    const byCommonName = await catalog.listSpecies({ language: 'en', search: 'комар', limit: 10 });
    const byScientificName = await catalog.listSpecies({ language: 'en', search: 'AEDES', limit: 10 });

    expect(byCommonName.map((entry) => entry.id)).toEqual(['sp-1']);
    expect(byScientificName.map((entry) => entry.id)).toEqual(['sp-2']);
    expect(store.queries[0].options.search?.columns).toEqual(['scientific_name', 'common_name_en', 'common_name_ru']);
  });

  it('returns details with localized lists and translated region names', async () => {
    await cache.load('region');

    const detail = await catalog.getSpecies('sp-1', 'ru');

    expect(detail).toEqual({
      id: 'sp-1',
      scientific_name: 'Culex pipiens',
      common_name: 'Комар обыкновенный',
      vector_status: 'high',
      image_url: 'https://cdn.test/static/images/species/sp-1/detail.jpg',
      description: 'Breeds in standing water.',
      key_characteristics: ['Коричневое тело'],
      habitat_preferences: ['Urban drains'],
      geographic_regions: ['Альфа', 'unknown_region'],
      related_diseases: ['west_nile'],
    });
  });

  it('keeps region ids when regions are not loaded', async () => {
    const detail = await catalog.getSpecies('sp-1', 'en');

    expect(detail?.geographic_regions).toEqual(['z_region', 'unknown_region']);
    expect(detail?.key_characteristics).toEqual(['Brown body', 'Night biter']);
  });

  it('returns null for unknown or unusable species', async () => {
    await expect(catalog.getSpecies('sp-404', 'en')).resolves.toBeNull();
    await expect(catalog.getSpecies('sp-3', 'en')).resolves.toBeNull();
  });

  it('lists species with a real vector status when no disease is given', async () => {
    const vectors = await catalog.getVectorSpecies({ language: 'en' });

    expect(vectors.map((entry) => entry.id)).toEqual(['sp-4', 'sp-1']);
    expect(store.queries[0].options.excluding).toEqual({ vector_status: ['None', 'Unknown'] });
  });

  it('lists the vectors of a disease', async () => {
    const vectors = await catalog.getVectorSpecies({ language: 'en', diseaseId: 'west_nile' });

    expect(vectors.map((entry) => entry.id)).toEqual(['sp-4', 'sp-1']);
  });

  it('returns no vectors for unknown diseases or diseases without vectors', async () => {
    await expect(catalog.getVectorSpecies({ language: 'en', diseaseId: 'missing' })).resolves.toEqual([]);
    await expect(catalog.getVectorSpecies({ language: 'en', diseaseId: 'no_vectors' })).resolves.toEqual([]);
    expect(store.queries.every((entry) => entry.table === 'diseases')).toBe(true);
  });
});
