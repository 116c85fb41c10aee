import {
  CanonicalColumn,
  CatalogTitle,
  CountryFormat,
  NormalizeOptions,
  RawRow,
  RawTable,
  SourceDescriptor,
  SourceId,
} from '../dto/catalog.dto';
import {
  blankToNull,
  isDomesticCountry,
  parseContentType,
  parseOriginCountry,
  parseReleaseYear,
  parseRuntimeMinutes,
  parseSeasonCount,
  splitGenres,
} from '../utils/normalize';
import { AdapterResult, SourceAdapter } from './source-adapter';

const CANONICAL_COLUMNS: readonly CanonicalColumn[] = [
  'title',
  'type',
  'release_year',
  'country',
  'duration',
  'listed_in',
  'rating',
];

export const REQUIRED_COLUMNS: readonly CanonicalColumn[] = ['title', 'release_year', 'country'];

type ColumnMap = Map<CanonicalColumn, string>;

/**
 * Shared row normalization for the delimited title exports. Subclasses decide which sources
 * they accept and how the country cell is encoded.
 */
export abstract class CsvTitlesAdapter implements SourceAdapter {
  protected abstract readonly sourceIds: readonly SourceId[];
  protected abstract readonly countryFormat: CountryFormat;

  supports(sourceId: string): boolean {
    return this.sourceIds.some((id) => id === sourceId);
  }

  normalize(raw: RawTable, source: SourceDescriptor, options: NormalizeOptions): AdapterResult {
    const columnMap = this.mapColumns(raw.columns, source);
    const missing = REQUIRED_COLUMNS.filter((column) => !columnMap.has(column));
    if (missing.length) {
      return {
        ok: false,
        issue: {
          kind: 'SchemaMismatch',
          sourceId: source.id,
          message: `${source.file} is missing required column(s): ${missing.join(', ')}`,
        },
      };
    }

    const titles: CatalogTitle[] = [];
    let droppedRows = 0;
    for (const row of raw.rows) {
      const title = this.toTitle(row, columnMap, source, options);
      if (title) {
        titles.push(title);
      } else {
        droppedRows += 1;
      }
    }

    return { ok: true, titles, columns: new Set(columnMap.keys()), droppedRows };
  }

  protected columnCandidates(column: CanonicalColumn, source: SourceDescriptor): string[] {
    if (column === 'release_year') return [source.yearColumn, 'release_year'];
    if (column === 'country') return [source.countryColumn, 'country'];
    return [column];
  }

  private mapColumns(columns: readonly string[], source: SourceDescriptor): ColumnMap {
    const present = new Set(columns);
    const map: ColumnMap = new Map();
    for (const column of CANONICAL_COLUMNS) {
      const name = this.columnCandidates(column, source).find((candidate) => present.has(candidate));
      if (name) map.set(column, name);
    }
    return map;
  }

  private toTitle(
    row: RawRow,
    columnMap: ColumnMap,
    source: SourceDescriptor,
    options: NormalizeOptions,
  ): CatalogTitle | null {
    const cell = (column: CanonicalColumn): string | undefined => {
      const name = columnMap.get(column);
      return name === undefined ? undefined : row[name];
    };

    const releaseYear = parseReleaseYear(cell('release_year'), options.minReleaseYear, options.maxReleaseYear);
    if (releaseYear === null) return null;

    const contentType = parseContentType(cell('type'));
    const countryRaw = blankToNull(cell('country'));
    const durationRaw = blankToNull(cell('duration'));

    return Object.freeze({
      title: (cell('title') ?? '').trim(),
      contentType,
      releaseYear,
      countryRaw,
      originCountry: parseOriginCountry(countryRaw, this.countryFormat),
      isDomestic: isDomesticCountry(countryRaw, options.domesticAliases),
      platform: source.platform,
      durationRaw,
      runtimeMinutes: contentType === 'Movie' ? parseRuntimeMinutes(durationRaw) : null,
      seasonCount: contentType === 'TVShow' ? parseSeasonCount(durationRaw) : null,
      genres: Object.freeze(splitGenres(cell('listed_in'))),
      rating: blankToNull(cell('rating')),
    });
  }
}
