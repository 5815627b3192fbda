export * from './mdm-error.js';
export * from './error-response.js';
