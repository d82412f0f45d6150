import type { CacheDomain, FilterOption, FilterOptions } from '../../../shared/types';
import { describeError } from '../errors';
import type { LocalizationCache } from './localizationCache';

function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

export function sortSpeciesNames(names: readonly string[]): string[] {
  const unique = new Set(names.filter((name) => typeof name === 'string' && name.length > 0));
  return [...unique].sort(compareCodeUnits);
}

export function sortFilterOptions(options: readonly FilterOption[]): FilterOption[] {
  return [...options].sort(
    (left, right) => compareCodeUnits(left.name, right.name) || compareCodeUnits(left.id, right.id),
  );
}

function buildDomainOptions(cache: LocalizationCache, domain: CacheDomain, language: string): FilterOption[] {
  if (!cache.isLoaded(domain)) {
    return [];
  }

  try {
    const options = cache.ids(domain).map((id) => ({ id, name: cache.resolve(domain, language, id) }));
    return sortFilterOptions(options);
  } catch (error) {
    console.error(`[filter-options] Unable to build ${domain} options: ${describeError(error)}`);
    return [];
  }
}

export function composeFilterOptions(
  language: string,
  speciesNames: readonly string[],
  cache: LocalizationCache,
): FilterOptions {
  return {
    species: sortSpeciesNames(speciesNames),
    regions: buildDomainOptions(cache, 'region', language),
    data_sources: buildDomainOptions(cache, 'data_source', language),
  };
}

export interface FilterOptionsServiceOptions {
  cache: LocalizationCache;
  speciesNames: readonly string[];
}

export class FilterOptionsService {
  private readonly cache: LocalizationCache;
  private readonly speciesNames: readonly string[];

  constructor(options: FilterOptionsServiceOptions) {
    this.cache = options.cache;
    this.speciesNames = sortSpeciesNames(options.speciesNames);
  }

  getFilterOptions(language: string): FilterOptions {
    return composeFilterOptions(language, this.speciesNames, this.cache);
  }
}
