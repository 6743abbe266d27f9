export * from './event-publisher.js';
export * from './flatten.js';
export * from './output-dispatcher.js';
export * from './prediction-event.js';
export * from './stable-json.js';
export * from './warehouse-sink.js';
export * from './wire.js';
