import { SourceAdapter } from './adapters/source-adapter';
import { ListedTitlesAdapter } from './adapters/listed-titles.adapter';
import { ProductionCountriesAdapter } from './adapters/production-countries.adapter';
import { SourceDescriptor, SourceId } from './dto/catalog.dto';

export const SOURCE_REGISTRY: Readonly<Record<SourceId, SourceDescriptor>> = {
  netflix: {
    id: 'netflix',
    platform: 'Netflix',
    file: 'netflix_titles.csv',
    countryColumn: 'country',
    yearColumn: 'release_year',
  },
  'amazon-prime': {
    id: 'amazon-prime',
    platform: 'Amazon Prime',
    file: 'amazon_prime_titles.csv',
    countryColumn: 'country',
    yearColumn: 'release_year',
  },
  'disney-plus': {
    id: 'disney-plus',
    platform: 'Disney+',
    file: 'disney_plus_shows.csv',
    countryColumn: 'country',
    yearColumn: 'year',
  },
  'apple-tv': {
    id: 'apple-tv',
    platform: 'Apple TV',
    file: 'apple_tv_titles.csv',
    countryColumn: 'production_countries',
    yearColumn: 'release_year',
  },
  crunchyroll: {
    id: 'crunchyroll',
    platform: 'Crunchyroll',
    file: 'crunchyroll_titles.csv',
    countryColumn: 'production_countries',
    yearColumn: 'release_year',
  },
  hbo: {
    id: 'hbo',
    platform: 'HBO',
    file: 'hbo_titles.csv',
    countryColumn: 'production_countries',
    yearColumn: 'release_year',
  },
};

export const SOURCE_DESCRIPTORS: readonly SourceDescriptor[] = Object.values(SOURCE_REGISTRY);

export const SOURCE_ADAPTERS: readonly SourceAdapter[] = [new ListedTitlesAdapter(), new ProductionCountriesAdapter()];

export function isSourceId(value: string): value is SourceId {
  return Object.prototype.hasOwnProperty.call(SOURCE_REGISTRY, value);
}

export function findDescriptor(sourceId: string): SourceDescriptor | undefined {
  return isSourceId(sourceId) ? SOURCE_REGISTRY[sourceId] : undefined;
}

export function findAdapter(sourceId: SourceId): SourceAdapter | undefined {
  return SOURCE_ADAPTERS.find((adapter) => adapter.supports(sourceId));
}
