import { CatalogTitle, ContentType, CountryFormat, GenreTitle } from '../dto/catalog.dto';

export const UNKNOWN_COUNTRY = 'Unknown';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function blankToNull(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function toNumber(value: string | null | undefined): number | null {
  const text = blankToNull(value);
  if (text === null || !DECIMAL.test(text)) return null;
  const num = Number(text);
  return Number.isFinite(num) ? num : null;
}

export function parseReleaseYear(value: string | null | undefined, minYear: number, maxYear: number): number | null {
  const num = toNumber(value);
  if (num === null) return null;
  const year = Math.trunc(num);
  if (year < minYear || year > maxYear) return null;
  return year;
}

export function parseContentType(value: string | null | undefined): ContentType {
  const raw = String(value ?? '').toLowerCase().trim();
  if (raw === 'movie') return 'Movie';
  if (raw === 'tv show' || raw === 'tv' || raw === 'show') return 'TVShow';
  return 'Unknown';
}

/**
 * First entry of a country field. List-format cells look like `['United States', 'UK']`
 * and lose their brackets and quotes before splitting.
 */
export function parseOriginCountry(value: string | null | undefined, format: CountryFormat = 'plain'): string {
  const text = blankToNull(value);
  if (text === null) return UNKNOWN_COUNTRY;
  const cleaned = format === 'list' ? text.replace(/[[\]'"]/g, '') : text;
  const first = cleaned.split(',')[0].trim();
  return first || UNKNOWN_COUNTRY;
}

export function isDomesticCountry(value: string | null | undefined, aliases: readonly string[]): boolean {
  if (!value) return false;
  return aliases.some((alias) => value.includes(alias));
}

export function parseRuntimeMinutes(value: string | null | undefined): number | null {
  const text = blankToNull(value);
  if (text === null) return null;
  return toNumber(text.replace(/ min$/, ''));
}

export function parseSeasonCount(value: string | null | undefined): number | null {
  const text = blankToNull(value);
  if (text === null) return null;
  return toNumber(text.replace(/ Seasons$/, '').replace(/ Season$/, ''));
}

export function splitGenres(value: string | null | undefined): string[] {
  const text = blankToNull(value);
  if (text === null) return [];
  const genres: string[] = [];
  for (const part of text.split(',')) {
    const genre = part.trim();
    if (genre && !genres.includes(genre)) genres.push(genre);
  }
  return genres;
}

export function explodeGenres(titles: readonly CatalogTitle[]): GenreTitle[] {
  return titles.flatMap((title) => title.genres.map((genre) => ({ ...title, genre })));
}
