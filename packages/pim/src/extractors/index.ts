export * from './dimensions-parser.js';
export * from './keyword-tables.js';
export * from './text-extractor.js';
export * from './types.js';
export * from './vision-extractor.js';
export * from './vision-provider.js';
