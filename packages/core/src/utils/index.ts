export * from './hostname.js';
export * from './timestamp.js';
export * from './timeout.js';
