import { ascending, rollup, rollups } from 'd3-array';
import { CatalogTitle } from '../../catalog/dto/catalog.dto';
import { explodeGenres } from '../../catalog/utils/normalize';
import { describeNumbers, noData, NumericSummary, ok, QueryResult, rankByCount } from './query-result';

export interface RuntimeBin {
  from: number;
  to: number;
  count: number;
}

export interface RuntimeDistribution extends NumericSummary {
  bins: RuntimeBin[];
}

export interface SeasonDistribution {
  maxSeasons: number;
  counts: Array<{ seasons: number; count: number }>;
}

export interface RatingRuntimeRow extends NumericSummary {
  rating: string;
}

export interface GenreDecadeHeatmap {
  genres: string[];
  decades: number[];
  /** `counts[g][d]` is the number of titles of `genres[g]` released in `decades[d]`. */
  counts: number[][];
}

export function decadeOf(year: number): number {
  return Math.floor(year / 10) * 10;
}

export function runtimeDistribution(
  table: readonly CatalogTitle[],
  options: { binWidth?: number } = {},
): QueryResult<RuntimeDistribution> {
  const binWidth = options.binWidth ?? 10;
  const runtimes = table.flatMap((title) => (title.runtimeMinutes === null ? [] : [title.runtimeMinutes]));
  const summary = describeNumbers(runtimes);
  if (!summary) return noData('No movie runtimes available');

  const bins = rollups(
    runtimes,
    (values) => values.length,
    (runtime) => Math.floor(runtime / binWidth) * binWidth,
  )
    .map(([from, count]) => ({ from, to: from + binWidth, count }))
    .sort((a, b) => ascending(a.from, b.from));

  return ok({ ...summary, bins });
}

export function seasonDistribution(table: readonly CatalogTitle[]): QueryResult<SeasonDistribution> {
  const seasons = table.flatMap((title) => (title.seasonCount === null ? [] : [title.seasonCount]));
  if (!seasons.length) return noData('No TV show season counts available');

  const counts = rollups(seasons, (values) => values.length, (value) => value)
    .map(([value, count]) => ({ seasons: value, count }))
    .sort((a, b) => ascending(a.seasons, b.seasons));

  return ok({ maxSeasons: counts[counts.length - 1].seasons, counts });
}

/** Runtime spread of movies for the `topRatings` most common ratings, most common first. */
export function runtimeByRating(
  table: readonly CatalogTitle[],
  options: { topRatings?: number } = {},
): QueryResult<RatingRuntimeRow[]> {
  const topRatings = options.topRatings ?? 8;
  const samples = table.flatMap((title) =>
    title.runtimeMinutes === null || title.rating === null
      ? []
      : [{ rating: title.rating, runtime: title.runtimeMinutes }],
  );
  if (!samples.length) return noData('No rated movies with a runtime');

  const runtimes = new Map(
    rollups(
      samples,
      (values) => values.map((sample) => sample.runtime),
      (sample) => sample.rating,
    ),
  );
  const ranked = rankByCount(Array.from(runtimes, ([rating, values]): [string, number] => [rating, values.length]));

  const data = ranked.slice(0, topRatings).flatMap(([rating]) => {
    const summary = describeNumbers(runtimes.get(rating) ?? []);
    return summary ? [{ rating, ...summary }] : [];
  });
  return ok(data);
}

/** Title counts for the `topGenres` largest genres per release decade from `minDecade` on. */
export function genreDecadeHeatmap(
  table: readonly CatalogTitle[],
  options: { minDecade?: number; topGenres?: number } = {},
): QueryResult<GenreDecadeHeatmap> {
  const minDecade = options.minDecade ?? 1980;
  const topGenres = options.topGenres ?? 10;
  const exploded = explodeGenres(table.filter((title) => decadeOf(title.releaseYear) >= minDecade));
  if (!exploded.length) return noData(`No genre data for titles from the ${minDecade}s on`);

  const top = rankByCount(rollups(exploded, (values) => values.length, (row) => row.genre))
    .slice(0, topGenres)
    .map(([genre]) => genre);
  const kept = new Set(top);
  const rows = exploded.filter((row) => kept.has(row.genre));
  if (!rows.length) return noData('No genres left after applying the top-genre limit');

  const cells = rollup(
    rows,
    (values) => values.length,
    (row) => row.genre,
    (row) => decadeOf(row.releaseYear),
  );
  const genres = [...top].sort(ascending);
  const decades = Array.from(new Set(rows.map((row) => decadeOf(row.releaseYear)))).sort(ascending);
  const counts = genres.map((genre) => decades.map((decade) => cells.get(genre)?.get(decade) ?? 0));

  return ok({ genres, decades, counts });
}
