export type PipelineStage = 'admission' | 'ingest' | 'enrich' | 'vision' | 'fuse';

export type AdmissionErrorType = 'rate_limited' | 'batch_limit_exceeded' | 'text_limit_exceeded';

export type StagedErrorType =
  | 'fetch_failed'
  | 'malformed_input'
  | 'unreachable_resource'
  | 'timeout'
  | 'unsupported_format';

export type BatchError = Readonly<{
  index: number;
  productId: string;
  stage: PipelineStage;
  errorType: AdmissionErrorType | StagedErrorType;
  message: string;
}>;

export type IndexedItem<TItem> = Readonly<{ index: number; item: TItem }>;

export type BatchResult<TItem> = Readonly<{
  items: IndexedItem<TItem>[];
  errors: BatchError[];
}>;

/** Milliseconds spent per stage for one record (or summed across a request). */
export type StageTimings = {
  ingestMs: number;
  enrichMs: number;
  visionMs: number;
  fuseMs: number;
};
