import { CountryFormat, SourceId } from '../dto/catalog.dto';
import { CsvTitlesAdapter } from './csv-titles.adapter';

/** Exports with a plain `country` cell such as `France, Germany`. */
export class ListedTitlesAdapter extends CsvTitlesAdapter {
  protected readonly sourceIds: readonly SourceId[] = ['netflix', 'amazon-prime', 'disney-plus'];
  protected readonly countryFormat: CountryFormat = 'plain';
}
