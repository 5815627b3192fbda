export * from './json.js';
export * from './normalize.js';
export * from './filter.js';
export * from './retry.js';
export * from './business-config.js';
