export * from './synthesizer.js';
