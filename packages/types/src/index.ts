export * from './api.js';
export * from './batch.js';
export * from './catalog.js';
