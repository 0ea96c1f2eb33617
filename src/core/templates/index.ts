export * from './solution.js';
export * from './extractor.js';
export * from './registry-init.js';
