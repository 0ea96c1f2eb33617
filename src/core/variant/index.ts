export * from './types.js';
export * from './defines.js';
export * from './references.js';
export * from './solution.js';
export * from './manager.js';
