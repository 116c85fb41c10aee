import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { resolve } from 'path';
import { CatalogConfig } from '../../config/catalog.config';
import { CatalogService } from './catalog.service';

const FIXTURES = resolve(__dirname, '../../../test/fixtures');

async function createService(overrides: Partial<CatalogConfig> = {}): Promise<CatalogService> {
  const catalog: CatalogConfig = {
    dataDir: resolve(FIXTURES, 'catalog'),
    detailSource: 'netflix',
    domesticAliases: ['United States', 'US'],
    minReleaseYear: 1888,
    maxReleaseYear: 2030,
    ...overrides,
  };

  const moduleRef = await Test.createTestingModule({
    providers: [CatalogService, { provide: ConfigService, useValue: new ConfigService({ catalog }) }],
  }).compile();
  moduleRef.useLogger(false);

  return moduleRef.get(CatalogService);
}

describe('CatalogService', () => {
  describe('loadSource', () => {
    it('loads and normalizes a single source', async () => {
      const service = await createService();

      const load = await service.loadSource('netflix');

      expect(load.status).toBe('loaded');
      expect(load.droppedRows).toBe(1);
      expect(load.titles.map((title) => title.title)).toEqual([
        'Harbor Lights',
        'Quiet Fields',
        'Paper Moons',
        'Long Winter',
      ]);
      expect(load.titles[2]).toMatchObject({ countryRaw: null, originCountry: 'Unknown', runtimeMinutes: null });
      expect(load.titles[3]).toMatchObject({ originCountry: 'United Kingdom', isDomestic: true, seasonCount: 1 });
    });

    it('returns an empty table and a SourceUnavailable issue for a missing file', async () => {
      const service = await createService();

      const load = await service.loadSource('hbo');

      expect(load.status).toBe('unavailable');
      expect(load.titles).toEqual([]);
      expect(load.issues).toHaveLength(1);
      expect(load.issues[0]).toMatchObject({ kind: 'SourceUnavailable', sourceId: 'hbo' });
      expect(load.issues[0].message).toContain('hbo_titles.csv');
    });

    it('reuses the first load for the lifetime of the service', async () => {
      const service = await createService();

      const [first, second] = await Promise.all([service.loadSource('netflix'), service.loadSource('netflix')]);
      const third = await service.loadSource('netflix');

      expect(second).toBe(first);
      expect(third).toBe(first);
    });
  });

  describe('getPlatformCatalog', () => {
    it('merges the five readable sources when one is missing', async () => {
      const service = await createService();

      const catalog = await service.getPlatformCatalog();

      expect(catalog.titles).toHaveLength(13);
      expect(catalog.sources.map((source) => [source.sourceId, source.status, source.rows])).toEqual([
        ['netflix', 'loaded', 4],
        ['amazon-prime', 'loaded', 2],
        ['disney-plus', 'loaded', 3],
        ['apple-tv', 'loaded', 2],
        ['crunchyroll', 'loaded', 2],
        ['hbo', 'unavailable', 0],
      ]);
      expect(catalog.issues.map((issue) => issue.kind)).toEqual(['SourceUnavailable']);
    });

    it('keeps only the common columns on merged rows', async () => {
      const service = await createService();

      const catalog = await service.getPlatformCatalog();

      expect(Object.keys(catalog.titles[0]).sort()).toEqual([
        'contentType',
        'countryRaw',
        'isDomestic',
        'originCountry',
        'platform',
        'releaseYear',
        'title',
      ]);
      expect(catalog.titles.filter((title) => title.platform === 'Disney+').map((title) => title.releaseYear)).toEqual(
        [2016, 2013, 2016],
      );
    });

    it('excludes sources whose schema does not match', async () => {
      const service = await createService({ dataDir: resolve(FIXTURES, 'mismatch') });

      const catalog = await service.getPlatformCatalog();

      expect(catalog.titles.map((title) => title.title)).toEqual(['Lone Peak']);
      expect(catalog.sources.find((source) => source.sourceId === 'netflix')?.status).toBe('schema-mismatch');
      expect(catalog.issues.filter((issue) => issue.kind === 'SchemaMismatch').map((issue) => issue.sourceId)).toEqual([
        'netflix',
      ]);
    });

    it('returns frozen tables', async () => {
      const service = await createService();

      const catalog = await service.getPlatformCatalog();

      expect(Object.isFrozen(catalog.titles)).toBe(true);
      expect(Object.isFrozen(catalog.titles[0])).toBe(true);
    });
  });

  describe('getDetailCatalog', () => {
    it('uses the configured detail source', async () => {
      const service = await createService();

      const detail = await service.getDetailCatalog();

      expect(detail.sourceId).toBe('netflix');
      expect(detail.titles).toHaveLength(4);
      expect(detail.issues).toEqual([]);
    });

    it('is empty with a SchemaMismatch issue when the source lacks detail columns', async () => {
      const service = await createService({ dataDir: resolve(FIXTURES, 'mismatch'), detailSource: 'amazon-prime' });

      const detail = await service.getDetailCatalog();

      expect(detail.titles).toEqual([]);
      expect(detail.issues).toEqual([
        {
          kind: 'SchemaMismatch',
          sourceId: 'amazon-prime',
          message: 'amazon_prime_titles.csv cannot back the detail table, missing: duration, listed_in',
        },
      ]);
    });

    it('reports an unknown detail source', async () => {
      const service = await createService({ detailSource: 'vhs-archive' });

      const detail = await service.getDetailCatalog();

      expect(detail.titles).toEqual([]);
      expect(detail.issues[0]).toMatchObject({ kind: 'SourceUnavailable', sourceId: 'vhs-archive' });
    });
  });

  it('fails at construction when the catalog config namespace is missing', async () => {
    const compile = Test.createTestingModule({
      providers: [CatalogService, { provide: ConfigService, useValue: new ConfigService({}) }],
    }).compile();

    await expect(compile).rejects.toThrow(/catalog/);
  });
});
