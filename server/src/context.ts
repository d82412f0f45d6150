import type { CacheDomain } from '../../shared/types';
import type { AppConfig } from './config';
import { describeError } from './errors';
import { DiseaseCatalog } from './services/diseaseCatalog';
import type { DocumentStore } from './services/documentStore';
import { FilterOptionsService } from './services/filterOptions';
import { GeoLayerService } from './services/geoLayer';
import { LocalizationCache } from './services/localizationCache';
import { ObservationRepository } from './services/observationRepository';
import { SpeciesCatalog, loadSpeciesNames } from './services/speciesCatalog';

export interface AppContext {
  config: AppConfig;
  localization: LocalizationCache;
  filterOptions: FilterOptionsService;
  geoLayers: GeoLayerService;
  observations: ObservationRepository;
  species: SpeciesCatalog;
  diseases: DiseaseCatalog;
}

const CACHE_DOMAINS: readonly CacheDomain[] = ['region', 'data_source'];

/**
 * Builds every service and fills the translation cache and species list.
 * Must complete before the HTTP server accepts requests.
 */
export async function createAppContext(config: AppConfig, store: DocumentStore): Promise<AppContext> {
  const localization = new LocalizationCache({
    store,
    defaultLanguage: config.defaultLanguage,
    supportedLanguages: config.supportedLanguages,
  });

  for (const domain of CACHE_DOMAINS) {
    try {
      await localization.load(domain);
    } catch (error) {
      // The domain stays unloaded and its filter options come back empty.
      console.error(`[startup] ${describeError(error)}`);
    }
  }

  const speciesNames = await loadSpeciesNames(store);
  console.info(`[startup] Loaded ${speciesNames.length} species names.`);

  const diseases = new DiseaseCatalog({ store, cache: localization, staticUrlBase: config.staticUrlBase });

  return {
    config,
    localization,
    filterOptions: new FilterOptionsService({ cache: localization, speciesNames }),
    geoLayers: new GeoLayerService({ store, defaultLimit: config.geoLayerLimit }),
    observations: new ObservationRepository({ store, anonymousUserId: config.anonymousUserId }),
    species: new SpeciesCatalog({ store, cache: localization, diseases, staticUrlBase: config.staticUrlBase }),
    diseases,
  };
}
