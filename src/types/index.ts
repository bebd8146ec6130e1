export * from './config.js';
export * from './search.js';
export * from './vault.js';
