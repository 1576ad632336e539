/**
 * @netsnap/core
 *
 * Data model, capability interfaces, error taxonomy and shared helpers
 * for the configuration backup engine.
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// Errors
export * from './errors/index.js';
