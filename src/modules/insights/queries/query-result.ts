import { descending, deviation, extent, mean, median, quantile } from 'd3-array';
import { ContentType } from '../../catalog/dto/catalog.dto';

export type QueryResult<T> = { status: 'ok'; data: T } | { status: 'empty'; reason: string };

export type YearRange = readonly [number, number];
export type ContentTypeFilter = 'all' | Exclude<ContentType, 'Unknown'>;

export interface NumericSummary {
  count: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  mean: number;
  stdDev: number | null;
}

export function ok<T>(data: T): QueryResult<T> {
  return { status: 'ok', data };
}

export function noData<T>(reason: string): QueryResult<T> {
  return { status: 'empty', reason };
}

export function matchesContentType(title: { contentType: ContentType }, filter: ContentTypeFilter): boolean {
  return filter === 'all' || title.contentType === filter;
}

/** Share of domestic titles; an empty group counts as 0 rather than NaN. */
export function domesticRatio(domesticCount: number, totalCount: number): number {
  return totalCount === 0 ? 0 : domesticCount / totalCount;
}

/** Sorts `[key, count]` pairs by count, keeping first-seen order among equal counts. */
export function rankByCount<K>(entries: ReadonlyArray<[K, number]>): Array<[K, number]> {
  return [...entries].sort((a, b) => descending(a[1], b[1]));
}

export function describeNumbers(values: readonly number[]): NumericSummary | null {
  const [min, max] = extent(values);
  const q1 = quantile(values, 0.25);
  const mid = median(values);
  const q3 = quantile(values, 0.75);
  const avg = mean(values);
  if (
    min === undefined ||
    max === undefined ||
    q1 === undefined ||
    mid === undefined ||
    q3 === undefined ||
    avg === undefined
  ) {
    return null;
  }

  return {
    count: values.length,
    min,
    q1,
    median: mid,
    q3,
    max,
    mean: avg,
    stdDev: deviation(values) ?? null,
  };
}
