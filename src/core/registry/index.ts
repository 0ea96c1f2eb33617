/**
 * Project registry: manifest-driven or discovered from templates.
 */
export * from './types.js';
export * from './schema.js';
export * from './loader.js';
export * from './discovery.js';
