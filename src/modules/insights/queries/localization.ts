import { ascending, descending, groups, rollups } from 'd3-array';
import { Platform, PlatformTitle } from '../../catalog/dto/catalog.dto';
import { domesticRatio, noData, ok, QueryResult, YearRange } from './query-result';

export interface LocalizationFilter {
  yearRange: YearRange;
  platforms: readonly Platform[];
}

export interface PlatformRatioRow {
  platform: Platform;
  ratio: number;
  domesticCount: number;
  totalCount: number;
}

export interface LocalizationTrendRow extends PlatformRatioRow {
  year: number;
}

export interface LocalizationGrowthRow {
  platform: Platform;
  year: number;
  growth: number | null;
}

export interface LocalizationOverview {
  totalTitles: number;
  domesticRatio: number;
  platformCount: number;
  yearSpan: number;
}

interface Tally {
  domesticCount: number;
  totalCount: number;
}

function tally(titles: readonly PlatformTitle[]): Tally {
  return {
    domesticCount: titles.filter((title) => title.isDomestic).length,
    totalCount: titles.length,
  };
}

export function filterLocalization<T extends PlatformTitle>(table: readonly T[], filter: LocalizationFilter): T[] {
  const [from, to] = filter.yearRange;
  const platforms = new Set(filter.platforms);
  return table.filter(
    (title) => title.releaseYear >= from && title.releaseYear <= to && platforms.has(title.platform),
  );
}

export function localizationOverview(
  table: readonly PlatformTitle[],
  filter: LocalizationFilter,
): LocalizationOverview {
  const rows = filterLocalization(table, filter);
  const { domesticCount, totalCount } = tally(rows);
  const [from, to] = filter.yearRange;
  return {
    totalTitles: totalCount,
    domesticRatio: domesticRatio(domesticCount, totalCount),
    platformCount: new Set(rows.map((title) => title.platform)).size,
    yearSpan: to - from + 1,
  };
}

/** Domestic share per platform, highest first; equal ratios fall back to platform name. */
export function localContentRatio(
  table: readonly PlatformTitle[],
  filter: LocalizationFilter,
): QueryResult<PlatformRatioRow[]> {
  const rows = filterLocalization(table, filter);
  if (!rows.length) return noData('No titles match the selected years and platforms');

  const data = rollups(rows, tally, (title) => title.platform)
    .map(([platform, counts]) => ({
      platform,
      ratio: domesticRatio(counts.domesticCount, counts.totalCount),
      domesticCount: counts.domesticCount,
      totalCount: counts.totalCount,
    }))
    .sort((a, b) => descending(a.ratio, b.ratio) || ascending(a.platform, b.platform));

  return ok(data);
}

/** One row per platform and release year that has titles; absent years are left out. */
export function localizationTrend(
  table: readonly PlatformTitle[],
  filter: LocalizationFilter,
): QueryResult<LocalizationTrendRow[]> {
  const rows = filterLocalization(table, filter);
  if (!rows.length) return noData('No titles match the selected years and platforms');

  const data = rollups(
    rows,
    tally,
    (title) => title.platform,
    (title) => title.releaseYear,
  )
    .flatMap(([platform, years]) =>
      years.map(([year, counts]) => ({
        platform,
        year,
        ratio: domesticRatio(counts.domesticCount, counts.totalCount),
        domesticCount: counts.domesticCount,
        totalCount: counts.totalCount,
      })),
    )
    .sort((a, b) => ascending(a.platform, b.platform) || ascending(a.year, b.year));

  return ok(data);
}

/**
 * Year-over-year change of each platform's domestic ratio over the last `lastYears` years of
 * the trend. The change is measured against the platform's previous year with titles; it is
 * null when there is none or when that ratio was 0.
 */
export function localizationGrowth(
  trend: readonly LocalizationTrendRow[],
  lastYears = 5,
): LocalizationGrowthRow[] {
  const years = Array.from(new Set(trend.map((row) => row.year))).sort(ascending);
  const recent = new Set(years.slice(Math.max(years.length - lastYears, 0)));

  const rows: LocalizationGrowthRow[] = [];
  for (const [platform, series] of groups(trend, (row) => row.platform)) {
    const ordered = [...series].sort((a, b) => ascending(a.year, b.year));
    ordered.forEach((row, index) => {
      if (!recent.has(row.year)) return;
      const previous = index > 0 ? ordered[index - 1].ratio : 0;
      rows.push({
        platform,
        year: row.year,
        growth: previous === 0 ? null : (row.ratio - previous) / previous,
      });
    });
  }

  return rows.sort((a, b) => ascending(a.platform, b.platform) || ascending(a.year, b.year));
}
