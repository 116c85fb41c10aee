import { registerAs } from '@nestjs/config';

export interface CatalogConfig {
  dataDir: string;
  detailSource: string;
  domesticAliases: string[];
  minReleaseYear: number;
  maxReleaseYear: number;
}

export const DEFAULT_DOMESTIC_ALIASES = ['United States', 'US'];

export function toInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
}

export default registerAs(
  'catalog',
  (): CatalogConfig => ({
    dataDir: process.env.CATALOG_DATA_DIR || 'data',
    detailSource: process.env.CATALOG_DETAIL_SOURCE || 'netflix',
    domesticAliases: toList(process.env.CATALOG_DOMESTIC_ALIASES, DEFAULT_DOMESTIC_ALIASES),
    minReleaseYear: toInt(process.env.CATALOG_MIN_RELEASE_YEAR, 1888),
    maxReleaseYear: toInt(process.env.CATALOG_MAX_RELEASE_YEAR, new Date().getFullYear() + 1),
  }),
);
