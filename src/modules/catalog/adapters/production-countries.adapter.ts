import { CountryFormat, SourceId } from '../dto/catalog.dto';
import { CsvTitlesAdapter } from './csv-titles.adapter';

/** Exports carrying `production_countries` as a serialized list, e.g. `['US', 'GB']`. */
export class ProductionCountriesAdapter extends CsvTitlesAdapter {
  protected readonly sourceIds: readonly SourceId[] = ['apple-tv', 'crunchyroll', 'hbo'];
  protected readonly countryFormat: CountryFormat = 'list';
}
