/**
 * @app/pim - product attribute enrichment and fusion.
 *
 * Admission control, the per-record pipeline (ingest, text enrich, vision, fuse), the batch
 * orchestrator, and the output sinks fed by successful predictions.
 */

export * from './extractors/index.js';
export * from './outputs/index.js';
export * from './schemas/prediction-event.js';
export * from './services/index.js';
export * from './utils/hmac.js';
