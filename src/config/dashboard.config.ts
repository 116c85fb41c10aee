import { registerAs } from '@nestjs/config';
import { toInt } from './catalog.config';

export interface DashboardConfig {
  yearFrom: number;
  cutoffYear: number;
  minCountryCount: number;
  topCountries: number;
  topRatings: number;
  topGenres: number;
  minDecade: number;
}

export default registerAs(
  'dashboard',
  (): DashboardConfig => ({
    yearFrom: toInt(process.env.DASHBOARD_YEAR_FROM, 2010),
    cutoffYear: toInt(process.env.DASHBOARD_CUTOFF_YEAR, 2015),
    minCountryCount: toInt(process.env.DASHBOARD_MIN_COUNTRY_COUNT, 15),
    topCountries: toInt(process.env.DASHBOARD_TOP_COUNTRIES, 10),
    topRatings: toInt(process.env.DASHBOARD_TOP_RATINGS, 8),
    topGenres: toInt(process.env.DASHBOARD_TOP_GENRES, 10),
    minDecade: toInt(process.env.DASHBOARD_MIN_DECADE, 1980),
  }),
);
