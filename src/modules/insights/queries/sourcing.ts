import { ascending, descending, rollups, sum } from 'd3-array';
import { CatalogTitle } from '../../catalog/dto/catalog.dto';
import { explodeGenres, UNKNOWN_COUNTRY } from '../../catalog/utils/normalize';
import { ContentTypeFilter, matchesContentType, noData, ok, QueryResult, rankByCount } from './query-result';

export interface CountrySourcingFilter {
  contentType: ContentTypeFilter;
  minCount: number;
}

export interface TreemapFilter {
  contentType: ContentTypeFilter;
  topCountries: number;
}

export interface CountryCountRow {
  country: string;
  count: number;
}

export interface CountryGenreRow {
  country: string;
  genre: string;
  count: number;
}

export interface SourcingSummary {
  totalTitles: number;
  countryCount: number;
  topCountry: string;
}

/** Titles produced outside the home market, narrowed to one content type. */
export function internationalTitles(table: readonly CatalogTitle[], contentType: ContentTypeFilter): CatalogTitle[] {
  return table.filter((title) => !title.isDomestic && matchesContentType(title, contentType));
}

export function sourcingSummary(
  table: readonly CatalogTitle[],
  filter: Pick<CountrySourcingFilter, 'contentType'>,
): QueryResult<SourcingSummary> {
  const rows = internationalTitles(table, filter.contentType);
  if (!rows.length) return noData('No international titles for the selected content type');

  const counts = rollups(rows, (values) => values.length, (title) => title.originCountry);
  const [top] = [...counts].sort((a, b) => descending(a[1], b[1]) || ascending(a[0], b[0]));
  return ok({
    totalTitles: rows.length,
    countryCount: counts.length,
    topCountry: top[0],
  });
}

/** Titles per origin country; `minCount` is inclusive and the "Unknown" bucket is left out. */
export function countrySourcing(
  table: readonly CatalogTitle[],
  filter: CountrySourcingFilter,
): QueryResult<CountryCountRow[]> {
  const rows = internationalTitles(table, filter.contentType);
  if (!rows.length) return noData('No international titles for the selected content type');

  const data = rankByCount(rollups(rows, (values) => values.length, (title) => title.originCountry))
    .filter(([country, count]) => country !== UNKNOWN_COUNTRY && count >= filter.minCount)
    .map(([country, count]) => ({ country, count }));
  return ok(data);
}

/**
 * Genre counts inside the `topCountries` busiest origin countries, ranked by their exploded
 * totals. Countries with equal totals keep the order in which they first appear in the table.
 */
export function genreByCountryTreemap(
  table: readonly CatalogTitle[],
  filter: TreemapFilter,
): QueryResult<CountryGenreRow[]> {
  const exploded = explodeGenres(internationalTitles(table, filter.contentType));
  if (!exploded.length) return noData('No genre data for international titles');

  const byCountry = rollups(
    exploded,
    (values) => values.length,
    (row) => row.originCountry,
    (row) => row.genre,
  );
  const genresByCountry = new Map(byCountry);
  const totals = rankByCount(
    byCountry.map(([country, genres]): [string, number] => [country, sum(genres, ([, count]) => count)]),
  );

  const data = totals.slice(0, filter.topCountries).flatMap(([country]) =>
    [...(genresByCountry.get(country) ?? [])]
      .sort((a, b) => ascending(a[0], b[0]))
      .map(([genre, count]) => ({ country, genre, count })),
  );

  if (!data.length) return noData('No countries left after applying the top-country limit');
  return ok(data);
}
