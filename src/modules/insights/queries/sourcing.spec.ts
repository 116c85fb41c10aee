import { makeTitle, makeTitles } from '../../../../test/factories/title.factory';
import { CatalogTitle } from '../../catalog/dto/catalog.dto';
import { countrySourcing, genreByCountryTreemap, internationalTitles, sourcingSummary } from './sourcing';

describe('sourcing queries', () => {
  const table: CatalogTitle[] = [
    ...makeTitles(15, { countryRaw: 'Japan', originCountry: 'Japan', genres: ['Anime Features'] }),
    ...makeTitles(14, { countryRaw: 'India', originCountry: 'India', genres: ['Dramas'] }),
    ...makeTitles(2, {
      countryRaw: null,
      originCountry: 'Unknown',
      contentType: 'TVShow',
      runtimeMinutes: null,
      seasonCount: 1,
      genres: ['Docuseries'],
    }),
    ...makeTitles(3, { countryRaw: 'United States', originCountry: 'United States', isDomestic: true }),
  ];

  it('keeps only titles produced outside the home market', () => {
    expect(internationalTitles(table, 'all')).toHaveLength(31);
    expect(internationalTitles(table, 'TVShow')).toHaveLength(2);
  });

  describe('sourcingSummary', () => {
    it('reports totals and the busiest origin country', () => {
      expect(sourcingSummary(table, { contentType: 'all' })).toEqual({
        status: 'ok',
        data: { totalTitles: 31, countryCount: 3, topCountry: 'Japan' },
      });
    });

    it('picks the alphabetically first country on a tie', () => {
      const tied = [
        makeTitle({ originCountry: 'Korea' }),
        makeTitle({ originCountry: 'Brazil' }),
      ];

      const result = sourcingSummary(tied, { contentType: 'all' });
      if (result.status !== 'ok') throw new Error(result.reason);

      expect(result.data.topCountry).toBe('Brazil');
    });

    it('returns no data when every title is domestic', () => {
      const domestic = makeTitles(2, { originCountry: 'United States', isDomestic: true });

      expect(sourcingSummary(domestic, { contentType: 'all' }).status).toBe('empty');
    });
  });

  describe('countrySourcing', () => {
    it('treats the minimum count as inclusive', () => {
      expect(countrySourcing(table, { contentType: 'all', minCount: 15 })).toEqual({
        status: 'ok',
        data: [{ country: 'Japan', count: 15 }],
      });
      expect(countrySourcing(table, { contentType: 'all', minCount: 14 })).toEqual({
        status: 'ok',
        data: [
          { country: 'Japan', count: 15 },
          { country: 'India', count: 14 },
        ],
      });
    });

    it('leaves out titles with an unknown origin', () => {
      expect(countrySourcing(table, { contentType: 'TVShow', minCount: 1 })).toEqual({ status: 'ok', data: [] });
    });
  });

  describe('genreByCountryTreemap', () => {
    it('lists genre counts for the busiest countries', () => {
      expect(genreByCountryTreemap(table, { contentType: 'all', topCountries: 2 })).toEqual({
        status: 'ok',
        data: [
          { country: 'Japan', genre: 'Anime Features', count: 15 },
          { country: 'India', genre: 'Dramas', count: 14 },
        ],
      });
    });

    it('ranks countries by exploded genre totals and keeps first appearance on ties', () => {
      const rows = [
        makeTitle({ originCountry: 'Korea', genres: ['Thrillers', 'Dramas'] }),
        makeTitle({ originCountry: 'Spain', genres: ['Comedies'] }),
        makeTitle({ originCountry: 'Korea', genres: ['Dramas'] }),
        makeTitle({ originCountry: 'Spain', genres: ['Comedies', 'Dramas'] }),
        makeTitle({ originCountry: 'Italy', genres: ['Dramas'] }),
      ];

      expect(genreByCountryTreemap(rows, { contentType: 'all', topCountries: 2 })).toEqual({
        status: 'ok',
        data: [
          { country: 'Korea', genre: 'Dramas', count: 2 },
          { country: 'Korea', genre: 'Thrillers', count: 1 },
          { country: 'Spain', genre: 'Comedies', count: 2 },
          { country: 'Spain', genre: 'Dramas', count: 1 },
        ],
      });
    });

    it('returns no data when the titles carry no genres', () => {
      const rows = makeTitles(3, { genres: [] });

      expect(genreByCountryTreemap(rows, { contentType: 'all', topCountries: 5 }).status).toBe('empty');
    });
  });
});
