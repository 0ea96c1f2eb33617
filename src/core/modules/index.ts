export * from './types.js';
export * from './category.js';
export * from './declarations.js';
