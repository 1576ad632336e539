export * from './device.js';
export * from './snapshot.js';
export * from './report.js';
export * from './capabilities.js';
