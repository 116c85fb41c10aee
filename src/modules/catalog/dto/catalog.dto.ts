export type ContentType = 'Movie' | 'TVShow' | 'Unknown';
export type Platform = 'Netflix' | 'Amazon Prime' | 'Disney+' | 'Apple TV' | 'Crunchyroll' | 'HBO';
export type SourceId = 'netflix' | 'amazon-prime' | 'disney-plus' | 'apple-tv' | 'crunchyroll' | 'hbo';
export type CountryFormat = 'plain' | 'list';

export const PLATFORMS: readonly Platform[] = ['Netflix', 'Amazon Prime', 'Disney+', 'Apple TV', 'Crunchyroll', 'HBO'];

/** Column names every adapter maps its source onto. */
export type CanonicalColumn = 'title' | 'type' | 'release_year' | 'country' | 'duration' | 'listed_in' | 'rating';

export interface CatalogTitle {
  title: string;
  contentType: ContentType;
  releaseYear: number;
  countryRaw: string | null;
  originCountry: string;
  isDomestic: boolean;
  platform: Platform;
  durationRaw: string | null;
  runtimeMinutes: number | null;
  seasonCount: number | null;
  genres: readonly string[];
  rating: string | null;
}

export type PlatformTitle = Pick<
  CatalogTitle,
  'title' | 'contentType' | 'releaseYear' | 'countryRaw' | 'originCountry' | 'isDomestic' | 'platform'
>;

export interface GenreTitle extends CatalogTitle {
  genre: string;
}

export type RawRow = Readonly<Record<string, string | undefined>>;

export interface RawTable {
  columns: readonly string[];
  rows: readonly RawRow[];
}

export interface SourceDescriptor {
  id: SourceId;
  platform: Platform;
  file: string;
  countryColumn: string;
  yearColumn: string;
}

export type IngestIssueKind = 'SourceUnavailable' | 'SchemaMismatch';

export interface IngestIssue {
  kind: IngestIssueKind;
  sourceId: string;
  message: string;
}

export type SourceStatus = 'loaded' | 'unavailable' | 'schema-mismatch';

export interface SourceLoad {
  sourceId: SourceId;
  platform: Platform;
  status: SourceStatus;
  columns: ReadonlySet<CanonicalColumn>;
  titles: readonly CatalogTitle[];
  droppedRows: number;
  issues: IngestIssue[];
}

export interface SourceSummary {
  sourceId: SourceId;
  platform: Platform;
  status: SourceStatus;
  rows: number;
  droppedRows: number;
}

export interface PlatformCatalog {
  titles: readonly PlatformTitle[];
  sources: SourceSummary[];
  issues: IngestIssue[];
}

export interface DetailCatalog {
  sourceId: string;
  titles: readonly CatalogTitle[];
  issues: IngestIssue[];
}

export interface NormalizeOptions {
  domesticAliases: readonly string[];
  minReleaseYear: number;
  maxReleaseYear: number;
}
