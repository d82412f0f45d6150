import type { CacheDomain } from '../../../shared/types';
import { LocalizationLoadError, LocalizationNotLoadedError, describeError } from '../errors';
import type { DocumentStore, Row } from './documentStore';

export const DOMAIN_TABLES: Readonly<Record<CacheDomain, string>> = {
  region: 'regions',
  data_source: 'data_sources',
};

type LabelTable = ReadonlyMap<string, string>;

interface DomainSnapshot {
  /** Canonical ids in the order the store returned them. */
  ids: readonly string[];
  labels: ReadonlyMap<string, LabelTable>;
}

type CacheSnapshot = ReadonlyMap<CacheDomain, DomainSnapshot>;

export interface LocalizationCacheOptions {
  store: DocumentStore;
  defaultLanguage: string;
  supportedLanguages: readonly string[];
}

export function labelColumn(language: string): string {
  return `name_${language}`;
}

function readLabel(row: Row, language: string): string | null {
  const value = row[labelColumn(language)];
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/**
 * Resolves the display label of one row: the requested language, then the
 * default language, then the canonical id.
 */
export function resolveLabel(row: Row, language: string, defaultLanguage: string, id: string): string {
  const requested = readLabel(row, language);
  if (requested !== null) {
    return requested;
  }

  const fallback = readLabel(row, defaultLanguage);
  if (fallback !== null) {
    return fallback;
  }

  return id;
}

function readId(row: Row): string | null {
  const value = row.id;
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

/**
 * Translation labels for regions and data sources, loaded once at startup.
 *
 * Readers always see a complete snapshot: `load` and `reload` build a new map
 * and replace the reference in one assignment.
 */
export class LocalizationCache {
  readonly defaultLanguage: string;
  readonly supportedLanguages: readonly string[];

  private readonly store: DocumentStore;
  private snapshot: CacheSnapshot = new Map();

  constructor(options: LocalizationCacheOptions) {
    this.store = options.store;
    this.defaultLanguage = options.defaultLanguage;
    this.supportedLanguages = options.supportedLanguages.includes(options.defaultLanguage)
      ? [...options.supportedLanguages]
      : [options.defaultLanguage, ...options.supportedLanguages];
  }

  async load(domain: CacheDomain, supportedLanguages: readonly string[] = this.supportedLanguages): Promise<void> {
    if (this.snapshot.has(domain)) {
      throw new LocalizationLoadError(domain, `Localization domain '${domain}' is already loaded; use reload().`);
    }

    const built = await this.buildDomain(domain, supportedLanguages);
    const next = new Map(this.snapshot);
    next.set(domain, built);
    this.snapshot = next;
    console.info(`[localization] Loaded ${built.ids.length} ${domain} labels for ${[...built.labels.keys()].join(', ')}.`);
  }

  /**
   * Rebuilds every loaded domain. The previous snapshot stays in place if any
   * domain fails to load.
   */
  async reload(): Promise<void> {
    const current = this.snapshot;
    const next = new Map<CacheDomain, DomainSnapshot>();

    for (const [domain, existing] of current) {
      next.set(domain, await this.buildDomain(domain, [...existing.labels.keys()]));
    }

    this.snapshot = next;
  }

  isLoaded(domain: CacheDomain): boolean {
    return this.snapshot.has(domain);
  }

  ids(domain: CacheDomain): readonly string[] {
    return this.requireDomain(domain).ids;
  }

  resolve(domain: CacheDomain, language: string, id: string): string {
    const labels = this.requireDomain(domain).labels.get(language);
    if (!labels) {
      return id;
    }
    return labels.get(id) ?? id;
  }

  private requireDomain(domain: CacheDomain): DomainSnapshot {
    const entry = this.snapshot.get(domain);
    if (!entry) {
      throw new LocalizationNotLoadedError(domain);
    }
    return entry;
  }

  private async buildDomain(domain: CacheDomain, languages: readonly string[]): Promise<DomainSnapshot> {
    const table = DOMAIN_TABLES[domain];
    const loadLanguages = languages.includes(this.defaultLanguage)
      ? languages
      : [this.defaultLanguage, ...languages];

    let rows: Row[];
    try {
      const result = await this.store.openTable(table).query({
        columns: ['id', ...loadLanguages.map(labelColumn)],
      });
      rows = result.rows;
    } catch (error) {
      throw new LocalizationLoadError(
        domain,
        `Failed to load ${domain} translations from '${table}': ${describeError(error)}`,
        { cause: error },
      );
    }

    const ids: string[] = [];
    const labels = new Map<string, Map<string, string>>(
      loadLanguages.map((language) => [language, new Map<string, string>()]),
    );

    rows.forEach((row) => {
      const id = readId(row);
      if (!id || labels.get(this.defaultLanguage)?.has(id)) {
        return;
      }
      ids.push(id);
      loadLanguages.forEach((language) => {
        labels.get(language)?.set(id, resolveLabel(row, language, this.defaultLanguage, id));
      });
    });

    return { ids, labels };
  }
}
