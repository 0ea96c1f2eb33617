export * from './template.js';
export * from './descriptor.js';
export * from './writer.js';
export * from './version.js';
