import { beforeEach, describe, expect, it, vi } from 'vitest';

import { FilterOptionsService, composeFilterOptions, sortSpeciesNames } from '../filterOptions';
import { LocalizationCache } from '../localizationCache';
import { FakeDocumentStore } from './fakeDocumentStore';

function createStore(): FakeDocumentStore {
  return new FakeDocumentStore({
    regions: [
      { id: 'z_region', name_en: 'Alpha', name_ru: 'Альфа' },
      { id: 'a_region', name_en: 'Zulu' },
      { id: 'm_region', name_en: 'Beta' },
    ],
    data_sources: [
      { id: 'b_src', name_en: 'Shared' },
      { id: 'a_src', name_en: 'Shared' },
      { id: 'gbif', name_en: 'GBIF' },
    ],
  });
}

describe('composeFilterOptions', () => {
  let cache: LocalizationCache;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    cache = new LocalizationCache({
      store: createStore(),
      defaultLanguage: 'en',
      supportedLanguages: ['en', 'ru'],
    });
    await cache.load('region');
    await cache.load('data_source');
  });

  it('sorts regions by localized name rather than id', () => {
    const options = composeFilterOptions('en', [], cache);

    expect(options.regions).toEqual([
      { id: 'z_region', name: 'Alpha' },
      { id: 'm_region', name: 'Beta' },
      { id: 'a_region', name: 'Zulu' },
    ]);
  });

  it('breaks name ties by id', () => {
    const options = composeFilterOptions('en', [], cache);

    expect(options.data_sources).toEqual([
      { id: 'gbif', name: 'GBIF' },
      { id: 'a_src', name: 'Shared' },
      { id: 'b_src', name: 'Shared' },
    ]);
  });

  it('uses default-language labels where a translation is missing', () => {
    const options = composeFilterOptions('ru', [], cache);

    expect(options.regions.map((option) => option.name)).toEqual(['Beta', 'Zulu', 'Альфа']);
  });

  it('falls back to raw ids for an unsupported language', () => {
    const options = composeFilterOptions('de', [], cache);

    expect(options.regions).toEqual([
      { id: 'a_region', name: 'a_region' },
      { id: 'm_region', name: 'm_region' },
      { id: 'z_region', name: 'z_region' },
    ]);
  });

  it('deduplicates and sorts species case-sensitively', () => {
    const options = composeFilterOptions('en', ['aedes', 'Culex pipiens', 'Aedes aegypti', 'Aedes aegypti'], cache);

    expect(options.species).toEqual(['Aedes aegypti', 'Culex pipiens', 'aedes']);
  });

  it('returns an empty list for a domain that failed to load', async () => {
    const store = createStore();
    store.failingTables.add('data_sources');
    const partial = new LocalizationCache({ store, defaultLanguage: 'en', supportedLanguages: ['en'] });
    await partial.load('region');
    await expect(partial.load('data_source')).rejects.toThrow();

    const options = composeFilterOptions('en', ['Culex pipiens'], partial);

    expect(options.species).toEqual(['Culex pipiens']);
    expect(options.regions).toHaveLength(3);
    expect(options.data_sources).toEqual([]);
  });
});

describe('FilterOptionsService', () => {
  it('serves the startup species list with every request', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const cache = new LocalizationCache({ store: createStore(), defaultLanguage: 'en', supportedLanguages: ['en'] });
    await cache.load('region');
    const service = new FilterOptionsService({ cache, speciesNames: ['Culex pipiens', 'Aedes albopictus'] });

    const options = service.getFilterOptions('en');

    expect(options.species).toEqual(['Aedes albopictus', 'Culex pipiens']);
    expect(options.regions[0]).toEqual({ id: 'z_region', name: 'Alpha' });
    expect(options.data_sources).toEqual([]);
  });

  it('exposes the species sorter', () => {
    expect(sortSpeciesNames(['b', 'B', 'a', ''])).toEqual(['B', 'a', 'b']);
  });
});
