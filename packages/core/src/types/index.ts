export * from './mdm.js';
