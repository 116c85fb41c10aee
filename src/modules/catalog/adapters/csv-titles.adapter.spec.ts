import { SOURCE_REGISTRY } from '../catalog.registry';
import { NormalizeOptions } from '../dto/catalog.dto';
import { parseCsv } from '../utils/csv';
import { ListedTitlesAdapter } from './listed-titles.adapter';
import { ProductionCountriesAdapter } from './production-countries.adapter';

const options: NormalizeOptions = {
  domesticAliases: ['United States', 'US'],
  minReleaseYear: 1888,
  maxReleaseYear: 2030,
};

describe('ListedTitlesAdapter', () => {
  const adapter = new ListedTitlesAdapter();

  it('supports the plain-country sources only', () => {
    expect(adapter.supports('netflix')).toBe(true);
    expect(adapter.supports('disney-plus')).toBe(true);
    expect(adapter.supports('hbo')).toBe(false);
  });

  it('normalizes rows and drops those without a usable year', () => {
    const raw = parseCsv(
      [
        'type,title,country,release_year,rating,duration,listed_in',
        'Movie,Harbor Lights,United States,2019,PG-13,90 min,"Dramas, Comedies"',
        'TV Show,Quiet Fields,"France, Germany",2021,TV-MA,3 Seasons,TV Dramas',
        'Movie,Broken Year,India,,PG,100 min,Dramas',
      ].join('\n'),
    );

    const result = adapter.normalize(raw, SOURCE_REGISTRY.netflix, options);
    if (!result.ok) throw new Error(result.issue.message);

    expect(result.droppedRows).toBe(1);
    expect(result.titles).toHaveLength(2);
    expect(result.titles[0]).toEqual({
      title: 'Harbor Lights',
      contentType: 'Movie',
      releaseYear: 2019,
      countryRaw: 'United States',
      originCountry: 'United States',
      isDomestic: true,
      platform: 'Netflix',
      durationRaw: '90 min',
      runtimeMinutes: 90,
      seasonCount: null,
      genres: ['Dramas', 'Comedies'],
      rating: 'PG-13',
    });
    expect(result.titles[1]).toMatchObject({
      contentType: 'TVShow',
      originCountry: 'France',
      isDomestic: false,
      runtimeMinutes: null,
      seasonCount: 3,
    });
  });

  it('renames the year alias and defaults a missing type column to Unknown', () => {
    const raw = parseCsv(['title,year,country', 'Star Tale,2016,United States'].join('\n'));

    const result = adapter.normalize(raw, SOURCE_REGISTRY['disney-plus'], options);
    if (!result.ok) throw new Error(result.issue.message);

    expect(result.titles[0]).toMatchObject({ releaseYear: 2016, contentType: 'Unknown', platform: 'Disney+' });
    expect(result.columns.has('release_year')).toBe(true);
    expect(result.columns.has('type')).toBe(false);
  });

  it('reports a schema mismatch when a required column is missing', () => {
    const raw = parseCsv(['title,type,release_year', 'No Country,Movie,2019'].join('\n'));

    const result = adapter.normalize(raw, SOURCE_REGISTRY.netflix, options);

    expect(result).toEqual({
      ok: false,
      issue: {
        kind: 'SchemaMismatch',
        sourceId: 'netflix',
        message: 'netflix_titles.csv is missing required column(s): country',
      },
    });
  });
});

describe('ProductionCountriesAdapter', () => {
  const adapter = new ProductionCountriesAdapter();

  it('reads serialized production country lists', () => {
    const raw = parseCsv(
      [
        'title,type,release_year,production_countries',
        `Signal Lost,SHOW,2021,"['US', 'GB']"`,
        `Night Train,MOVIE,2019,['FR']`,
        'Empty Reel,MOVIE,2018,[]',
      ].join('\n'),
    );

    const result = adapter.normalize(raw, SOURCE_REGISTRY['apple-tv'], options);
    if (!result.ok) throw new Error(result.issue.message);

    expect(result.titles.map((title) => [title.originCountry, title.isDomestic, title.contentType])).toEqual([
      ['US', true, 'TVShow'],
      ['FR', false, 'Movie'],
      ['Unknown', false, 'Movie'],
    ]);
    expect(result.titles.every((title) => title.platform === 'Apple TV')).toBe(true);
  });

  it('returns frozen rows', () => {
    const raw = parseCsv(['title,release_year,production_countries', `Blade Academy,2022,['JP']`].join('\n'));

    const result = adapter.normalize(raw, SOURCE_REGISTRY.crunchyroll, options);
    if (!result.ok) throw new Error(result.issue.message);

    expect(Object.isFrozen(result.titles[0])).toBe(true);
    expect(Object.isFrozen(result.titles[0].genres)).toBe(true);
  });
});
