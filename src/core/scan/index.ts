export * from './types.js';
export * from './scanner.js';
export * from './snapshot.js';
