import type {
  AttributeCandidate,
  CandidateSource,
  IngestedRecord,
  ProductRecord,
} from '@app/types';

/** One modality producing attribute candidates for a record. */
export interface AttributeExtractor {
  readonly source: CandidateSource;
  extract(record: IngestedRecord, signal: AbortSignal): Promise<AttributeCandidate[]>;
}

export interface ImageIngestor {
  ingest(record: ProductRecord, signal: AbortSignal): Promise<IngestedRecord>;
}
