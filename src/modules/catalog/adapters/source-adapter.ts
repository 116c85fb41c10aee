import { CanonicalColumn, CatalogTitle, IngestIssue, NormalizeOptions, RawTable, SourceDescriptor } from '../dto/catalog.dto';

export type AdapterResult =
  | { ok: true; titles: CatalogTitle[]; columns: Set<CanonicalColumn>; droppedRows: number }
  | { ok: false; issue: IngestIssue };

export interface SourceAdapter {
  supports(sourceId: string): boolean;
  normalize(raw: RawTable, source: SourceDescriptor, options: NormalizeOptions): AdapterResult;
}
