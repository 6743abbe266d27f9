export * from './otel-attributes.js';
export * from './otel-correlation.js';
export * from './redaction.js';
export * from './schema.js';
