import { csvParse } from 'd3-dsv';
import { RawTable } from '../dto/catalog.dto';

export function parseCsv(text: string): RawTable {
  const parsed = csvParse(text.replace(/^\uFEFF/, ''));
  return { columns: parsed.columns, rows: Array.from(parsed) };
}
