export * from './legacy.js';
export * from './resolver.js';
