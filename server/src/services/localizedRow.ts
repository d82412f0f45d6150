import type { Row } from './documentStore';

export function readText(row: Row, column: string): string | null {
  const value = row[column];
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function readTextList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0);
}

/** `<field>_<language>`, falling back to `<field>_<defaultLanguage>` when blank. */
export function localisedText(row: Row, field: string, language: string, defaultLanguage: string): string | null {
  return readText(row, `${field}_${language}`) ?? readText(row, `${field}_${defaultLanguage}`);
}

export function localisedList(row: Row, field: string, language: string, defaultLanguage: string): string[] {
  const requested = readTextList(row[`${field}_${language}`]);
  return requested.length > 0 ? requested : readTextList(row[`${field}_${defaultLanguage}`]);
}

export type ImageVariant = 'thumbnail' | 'detail';

export function buildImageUrl(
  staticUrlBase: string,
  collection: 'species' | 'diseases',
  id: string,
  variant: ImageVariant,
): string {
  return `${staticUrlBase}/static/images/${collection}/${encodeURIComponent(id)}/${variant}.jpg`;
}
