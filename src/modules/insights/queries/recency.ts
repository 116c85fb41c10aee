import { ascending, rollups } from 'd3-array';
import { CatalogTitle, ContentType } from '../../catalog/dto/catalog.dto';
import { ContentTypeFilter, describeNumbers, matchesContentType, noData, ok, QueryResult } from './query-result';

export interface RecencyFilter {
  contentType: ContentTypeFilter;
  cutoffYear: number;
}

export interface RecencySplit {
  recentCount: number;
  olderCount: number;
  recentShare: number;
  medianYear: number;
  meanYear: number;
}

export interface RecencyStatistics {
  stdDev: number | null;
  range: number;
  mode: number;
  q1: number;
  q2: number;
  q3: number;
}

export interface TimelineFilter {
  contentType: ContentTypeFilter;
  afterYear?: number;
}

export interface YearCountRow {
  year: number;
  count: number;
}

export interface SwimlaneRow {
  year: number;
  contentType: ContentType;
  count: number;
}

function releaseYears(table: readonly CatalogTitle[], contentType: ContentTypeFilter): number[] {
  return table.filter((title) => matchesContentType(title, contentType)).map((title) => title.releaseYear);
}

/** Most frequent year; the earliest one wins a tie. */
function modeYear(years: readonly number[]): number | null {
  let best: [number, number] | null = null;
  for (const [year, count] of rollups(years, (values) => values.length, (year) => year)) {
    if (!best || count > best[1] || (count === best[1] && year < best[0])) {
      best = [year, count];
    }
  }
  return best ? best[0] : null;
}

/** Titles released strictly after the cutoff are recent; the cutoff year itself is older. */
export function recencySplit(table: readonly CatalogTitle[], filter: RecencyFilter): QueryResult<RecencySplit> {
  const years = releaseYears(table, filter.contentType);
  const summary = describeNumbers(years);
  if (!summary) return noData('No titles for the selected content type');

  const recentCount = years.filter((year) => year > filter.cutoffYear).length;
  return ok({
    recentCount,
    olderCount: years.length - recentCount,
    recentShare: recentCount / years.length,
    medianYear: summary.median,
    meanYear: summary.mean,
  });
}

export function recencyStatistics(
  table: readonly CatalogTitle[],
  filter: Pick<RecencyFilter, 'contentType'>,
): QueryResult<RecencyStatistics> {
  const years = releaseYears(table, filter.contentType);
  const summary = describeNumbers(years);
  const mode = modeYear(years);
  if (!summary || mode === null) return noData('No titles for the selected content type');

  return ok({
    stdDev: summary.stdDev,
    range: summary.max - summary.min,
    mode,
    q1: summary.q1,
    q2: summary.median,
    q3: summary.q3,
  });
}

export function releaseTimeline(table: readonly CatalogTitle[], filter: TimelineFilter): QueryResult<YearCountRow[]> {
  const afterYear = filter.afterYear ?? 1920;
  const years = releaseYears(table, filter.contentType).filter((year) => year > afterYear);
  if (!years.length) return noData(`No titles released after ${afterYear}`);

  const data = rollups(years, (values) => values.length, (year) => year)
    .map(([year, count]) => ({ year, count }))
    .sort((a, b) => ascending(a.year, b.year));
  return ok(data);
}

export function typeSwimlane(table: readonly CatalogTitle[], filter: TimelineFilter): QueryResult<SwimlaneRow[]> {
  const afterYear = filter.afterYear ?? 2000;
  const rows = table.filter((title) => matchesContentType(title, filter.contentType) && title.releaseYear > afterYear);
  if (!rows.length) return noData(`No titles released after ${afterYear}`);

  const data = rollups(
    rows,
    (values) => values.length,
    (title) => title.releaseYear,
    (title) => title.contentType,
  )
    .flatMap(([year, types]) => types.map(([contentType, count]) => ({ year, contentType, count })))
    .sort((a, b) => ascending(a.year, b.year) || ascending(a.contentType, b.contentType));
  return ok(data);
}
