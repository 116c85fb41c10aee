import { Transform, Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { Platform, PLATFORMS } from '../../catalog/dto/catalog.dto';
import { ContentTypeFilter } from '../queries/query-result';

export const CONTENT_TYPE_FILTERS: readonly ContentTypeFilter[] = ['all', 'Movie', 'TVShow'];

function splitList({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') return value;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export class LocalizationFiltersDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  yearFrom?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  yearTo?: number;

  @IsOptional()
  @Transform(splitList)
  @IsArray()
  @ArrayNotEmpty()
  @IsIn(PLATFORMS, { each: true })
  platforms?: Platform[];

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  growthYears?: number;
}

export class RecencyFiltersDto {
  @IsOptional()
  @IsIn(CONTENT_TYPE_FILTERS)
  contentType?: ContentTypeFilter;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  cutoffYear?: number;
}

export class SourcingFiltersDto {
  @IsOptional()
  @IsIn(CONTENT_TYPE_FILTERS)
  contentType?: ContentTypeFilter;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  minCount?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  topCountries?: number;
}

export class DistributionFiltersDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(120)
  binWidth?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(30)
  topRatings?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  topGenres?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  minDecade?: number;
}

export interface DashboardFilters {
  localization?: Partial<Record<keyof LocalizationFiltersDto, unknown>>;
  recency?: Partial<Record<keyof RecencyFiltersDto, unknown>>;
  sourcing?: Partial<Record<keyof SourcingFiltersDto, unknown>>;
  distributions?: Partial<Record<keyof DistributionFiltersDto, unknown>>;
}
