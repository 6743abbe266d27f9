export * from './admission-guard.js';
export * from './batch-orchestrator.js';
export * from './catalog-service.js';
export * from './deadline.js';
export * from './errors.js';
export * from './fusion-config.js';
export * from './fusion-engine.js';
export * from './image-format.js';
export * from './image-ingest.js';
export * from './record-pipeline.js';
export * from './token-bucket.js';
