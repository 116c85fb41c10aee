import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { max } from 'd3-array';
import { DashboardConfig } from '../../config/dashboard.config';
import { CatalogService } from '../catalog/catalog.service';
import { IngestIssue, Platform, PLATFORMS, PlatformTitle, SourceSummary } from '../catalog/dto/catalog.dto';
import {
  DashboardFilters,
  DistributionFiltersDto,
  LocalizationFiltersDto,
  RecencyFiltersDto,
  SourcingFiltersDto,
} from './dto/insights-filters.dto';
import { validateFilters } from './dto/validate-filters';
import {
  genreDecadeHeatmap,
  GenreDecadeHeatmap,
  RatingRuntimeRow,
  runtimeByRating,
  runtimeDistribution,
  RuntimeDistribution,
  seasonDistribution,
  SeasonDistribution,
} from './queries/distributions';
import {
  LocalizationFilter,
  localizationGrowth,
  LocalizationGrowthRow,
  localizationOverview,
  LocalizationOverview,
  localizationTrend,
  LocalizationTrendRow,
  localContentRatio,
  PlatformRatioRow,
} from './queries/localization';
import { ContentTypeFilter, QueryResult } from './queries/query-result';
import {
  RecencyFilter,
  recencySplit,
  RecencySplit,
  recencyStatistics,
  RecencyStatistics,
  releaseTimeline,
  SwimlaneRow,
  typeSwimlane,
  YearCountRow,
} from './queries/recency';
import {
  countrySourcing,
  CountryCountRow,
  CountryGenreRow,
  genreByCountryTreemap,
  sourcingSummary,
  SourcingSummary,
} from './queries/sourcing';

export interface LocalizationPanel {
  filters: LocalizationFilter;
  overview: LocalizationOverview;
  ratios: QueryResult<PlatformRatioRow[]>;
  trend: QueryResult<LocalizationTrendRow[]>;
  growth: LocalizationGrowthRow[];
  warnings: IngestIssue[];
}

export interface RecencyPanel {
  filters: RecencyFilter;
  split: QueryResult<RecencySplit>;
  statistics: QueryResult<RecencyStatistics>;
  timeline: QueryResult<YearCountRow[]>;
  swimlane: QueryResult<SwimlaneRow[]>;
  warnings: IngestIssue[];
}

export interface SourcingPanel {
  filters: { contentType: ContentTypeFilter; minCount: number; topCountries: number };
  summary: QueryResult<SourcingSummary>;
  countries: QueryResult<CountryCountRow[]>;
  treemap: QueryResult<CountryGenreRow[]>;
  warnings: IngestIssue[];
}

export interface DistributionsPanel {
  runtime: QueryResult<RuntimeDistribution>;
  seasons: QueryResult<SeasonDistribution>;
  runtimeByRating: QueryResult<RatingRuntimeRow[]>;
  genreDecade: QueryResult<GenreDecadeHeatmap>;
  warnings: IngestIssue[];
}

export interface DashboardReport {
  sources: SourceSummary[];
  localization: LocalizationPanel;
  recency: RecencyPanel;
  sourcing: SourcingPanel;
  distributions: DistributionsPanel;
}

@Injectable()
export class InsightsService {
  private readonly logger = new Logger(InsightsService.name);

  constructor(
    private readonly catalogService: CatalogService,
    private readonly configService: ConfigService,
  ) {}

  async localization(input?: object): Promise<LocalizationPanel> {
    const dto = validateFilters(LocalizationFiltersDto, input);
    const catalog = await this.catalogService.getPlatformCatalog();
    const filters = this.resolveLocalizationFilter(dto, catalog.titles);

    const trend = localizationTrend(catalog.titles, filters);
    return {
      filters,
      overview: localizationOverview(catalog.titles, filters),
      ratios: localContentRatio(catalog.titles, filters),
      trend,
      growth: trend.status === 'ok' ? localizationGrowth(trend.data, dto.growthYears ?? 5) : [],
      warnings: catalog.issues,
    };
  }

  async recency(input?: object): Promise<RecencyPanel> {
    const dto = validateFilters(RecencyFiltersDto, input);
    const defaults = this.getDefaults();
    const catalog = await this.catalogService.getDetailCatalog();
    const filters: RecencyFilter = {
      contentType: dto.contentType ?? 'all',
      cutoffYear: dto.cutoffYear ?? defaults.cutoffYear,
    };

    return {
      filters,
      split: recencySplit(catalog.titles, filters),
      statistics: recencyStatistics(catalog.titles, filters),
      timeline: releaseTimeline(catalog.titles, { contentType: filters.contentType }),
      swimlane: typeSwimlane(catalog.titles, { contentType: filters.contentType }),
      warnings: catalog.issues,
    };
  }

  async sourcing(input?: object): Promise<SourcingPanel> {
    const dto = validateFilters(SourcingFiltersDto, input);
    const defaults = this.getDefaults();
    const catalog = await this.catalogService.getDetailCatalog();
    const filters = {
      contentType: dto.contentType ?? 'all',
      minCount: dto.minCount ?? defaults.minCountryCount,
      topCountries: dto.topCountries ?? defaults.topCountries,
    };

    return {
      filters,
      summary: sourcingSummary(catalog.titles, filters),
      countries: countrySourcing(catalog.titles, filters),
      treemap: genreByCountryTreemap(catalog.titles, filters),
      warnings: catalog.issues,
    };
  }

  async distributions(input?: object): Promise<DistributionsPanel> {
    const dto = validateFilters(DistributionFiltersDto, input);
    const defaults = this.getDefaults();
    const catalog = await this.catalogService.getDetailCatalog();

    return {
      runtime: runtimeDistribution(catalog.titles, { binWidth: dto.binWidth }),
      seasons: seasonDistribution(catalog.titles),
      runtimeByRating: runtimeByRating(catalog.titles, { topRatings: dto.topRatings ?? defaults.topRatings }),
      genreDecade: genreDecadeHeatmap(catalog.titles, {
        minDecade: dto.minDecade ?? defaults.minDecade,
        topGenres: dto.topGenres ?? defaults.topGenres,
      }),
      warnings: catalog.issues,
    };
  }

  async report(filters: DashboardFilters = {}): Promise<DashboardReport> {
    const [sources, localization, recency, sourcing, distributions] = await Promise.all([
      this.catalogService.describeSources(),
      this.localization(filters.localization),
      this.recency(filters.recency),
      this.sourcing(filters.sourcing),
      this.distributions(filters.distributions),
    ]);

    const loaded = sources.filter((source) => source.status === 'loaded').length;
    this.logger.log(`[INSIGHTS] report built sources=${loaded}/${sources.length}`);

    return { sources, localization, recency, sourcing, distributions };
  }

  private resolveLocalizationFilter(
    dto: LocalizationFiltersDto,
    titles: readonly PlatformTitle[],
  ): LocalizationFilter {
    const defaults = this.getDefaults();
    const yearFrom = dto.yearFrom ?? defaults.yearFrom;
    const yearTo = dto.yearTo ?? Math.max(max(titles, (title) => title.releaseYear) ?? yearFrom, yearFrom);
    if (yearFrom > yearTo) {
      throw new BadRequestException([`yearFrom (${yearFrom}) must not be after yearTo (${yearTo})`]);
    }

    const present = new Set(titles.map((title) => title.platform));
    const available = PLATFORMS.filter((platform) => present.has(platform));
    const platforms: readonly Platform[] = dto.platforms ?? (available.length ? available : PLATFORMS);

    return { yearRange: [yearFrom, yearTo], platforms };
  }

  private getDefaults(): DashboardConfig {
    return this.configService.getOrThrow<DashboardConfig>('dashboard');
  }
}
