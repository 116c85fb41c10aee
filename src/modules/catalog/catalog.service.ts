import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { CatalogConfig } from '../../config/catalog.config';
import { findAdapter, findDescriptor, SOURCE_DESCRIPTORS, SOURCE_REGISTRY } from './catalog.registry';
import {
  CanonicalColumn,
  CatalogTitle,
  DetailCatalog,
  IngestIssue,
  NormalizeOptions,
  PlatformCatalog,
  PlatformTitle,
  SourceDescriptor,
  SourceId,
  SourceLoad,
  SourceStatus,
  SourceSummary,
} from './dto/catalog.dto';
import { parseCsv } from './utils/csv';

export const DETAIL_COLUMNS: readonly CanonicalColumn[] = [
  'title',
  'type',
  'release_year',
  'country',
  'duration',
  'listed_in',
];

function toPlatformTitle(title: CatalogTitle): PlatformTitle {
  return Object.freeze({
    title: title.title,
    contentType: title.contentType,
    releaseYear: title.releaseYear,
    countryRaw: title.countryRaw,
    originCountry: title.originCountry,
    isDomestic: title.isDomestic,
    platform: title.platform,
  });
}

function summarize(load: SourceLoad): SourceSummary {
  return {
    sourceId: load.sourceId,
    platform: load.platform,
    status: load.status,
    rows: load.titles.length,
    droppedRows: load.droppedRows,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the provider exports once per process. Every accessor memoises its promise so
 * concurrent first calls share a single load. The `catalog` config namespace is required at
 * construction; after that no load rejects, and unreadable or malformed sources come back
 * as empty tables with an issue attached.
 */
@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);
  private readonly loads = new Map<SourceId, Promise<SourceLoad>>();
  private platformCatalog?: Promise<PlatformCatalog>;
  private detailCatalog?: Promise<DetailCatalog>;
  private readonly config: CatalogConfig;

  constructor(configService: ConfigService) {
    this.config = configService.getOrThrow<CatalogConfig>('catalog');
  }

  loadSource(sourceId: SourceId): Promise<SourceLoad> {
    const cached = this.loads.get(sourceId);
    if (cached) return cached;

    const pending = this.readSource(sourceId);
    this.loads.set(sourceId, pending);
    return pending;
  }

  getPlatformCatalog(): Promise<PlatformCatalog> {
    if (!this.platformCatalog) {
      this.platformCatalog = this.buildPlatformCatalog();
    }
    return this.platformCatalog;
  }

  getDetailCatalog(): Promise<DetailCatalog> {
    if (!this.detailCatalog) {
      this.detailCatalog = this.buildDetailCatalog();
    }
    return this.detailCatalog;
  }

  async describeSources(): Promise<SourceSummary[]> {
    const loads = await Promise.all(SOURCE_DESCRIPTORS.map((descriptor) => this.loadSource(descriptor.id)));
    return loads.map(summarize);
  }

  private async readSource(sourceId: SourceId): Promise<SourceLoad> {
    const descriptor = SOURCE_REGISTRY[sourceId];
    const adapter = findAdapter(sourceId);
    if (!adapter) {
      return this.failedLoad(descriptor, 'schema-mismatch', {
        kind: 'SchemaMismatch',
        sourceId,
        message: `No adapter registered for source: ${sourceId}`,
      });
    }

    const path = resolve(this.config.dataDir, descriptor.file);

    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      return this.failedLoad(descriptor, 'unavailable', {
        kind: 'SourceUnavailable',
        sourceId,
        message: `Could not read ${descriptor.file}: ${errorMessage(error)}`,
      });
    }

    const result = adapter.normalize(parseCsv(text), descriptor, this.normalizeOptions());
    if (!result.ok) {
      return this.failedLoad(descriptor, 'schema-mismatch', result.issue);
    }

    this.logger.log(
      `[CATALOG] loaded source=${sourceId} rows=${result.titles.length} dropped=${result.droppedRows}`,
    );

    return {
      sourceId,
      platform: descriptor.platform,
      status: 'loaded',
      columns: result.columns,
      titles: Object.freeze(result.titles),
      droppedRows: result.droppedRows,
      issues: [],
    };
  }

  private async buildPlatformCatalog(): Promise<PlatformCatalog> {
    const loads = await Promise.all(SOURCE_DESCRIPTORS.map((descriptor) => this.loadSource(descriptor.id)));

    const titles: PlatformTitle[] = [];
    const issues: IngestIssue[] = [];
    for (const load of loads) {
      issues.push(...load.issues);
      if (load.status !== 'loaded') continue;
      for (const title of load.titles) {
        titles.push(toPlatformTitle(title));
      }
    }

    const merged = loads.filter((load) => load.status === 'loaded').length;
    this.logger.log(`[CATALOG] merged sources=${merged}/${loads.length} titles=${titles.length}`);

    return { titles: Object.freeze(titles), sources: loads.map(summarize), issues };
  }

  private async buildDetailCatalog(): Promise<DetailCatalog> {
    const { detailSource } = this.config;
    const descriptor = findDescriptor(detailSource);
    if (!descriptor) {
      const issue: IngestIssue = {
        kind: 'SourceUnavailable',
        sourceId: detailSource,
        message: `Unknown detail source: ${detailSource}`,
      };
      this.logger.warn(`[CATALOG] ${issue.message}`);
      return { sourceId: detailSource, titles: [], issues: [issue] };
    }

    const load = await this.loadSource(descriptor.id);
    if (load.status !== 'loaded') {
      return { sourceId: descriptor.id, titles: [], issues: load.issues };
    }

    const missing = DETAIL_COLUMNS.filter((column) => !load.columns.has(column));
    if (missing.length) {
      const issue: IngestIssue = {
        kind: 'SchemaMismatch',
        sourceId: descriptor.id,
        message: `${descriptor.file} cannot back the detail table, missing: ${missing.join(', ')}`,
      };
      this.logger.warn(`[CATALOG] ${issue.message}`);
      return { sourceId: descriptor.id, titles: [], issues: [issue] };
    }

    return { sourceId: descriptor.id, titles: load.titles, issues: [] };
  }

  private failedLoad(descriptor: SourceDescriptor, status: SourceStatus, issue: IngestIssue): SourceLoad {
    this.logger.warn(`[CATALOG] ${issue.kind} source=${issue.sourceId} reason=${issue.message}`);
    return {
      sourceId: descriptor.id,
      platform: descriptor.platform,
      status,
      columns: new Set(),
      titles: [],
      droppedRows: 0,
      issues: [issue],
    };
  }

  private normalizeOptions(): NormalizeOptions {
    return {
      domesticAliases: this.config.domesticAliases,
      minReleaseYear: this.config.minReleaseYear,
      maxReleaseYear: this.config.maxReleaseYear,
    };
  }
}
