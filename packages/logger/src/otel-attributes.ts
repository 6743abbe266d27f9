export const OTEL_ATTR = {
  REQUEST_ID: 'http.request_id',

  PRODUCT_ID: 'catalog.product_id',
  BATCH_INDEX: 'catalog.batch.index',
  BATCH_SIZE: 'catalog.batch.size',
  PIPELINE_STAGE: 'catalog.pipeline.stage',
  CANDIDATE_COUNT: 'catalog.candidates.count',
} as const;

export type OtelAttrKey = (typeof OTEL_ATTR)[keyof typeof OTEL_ATTR];
