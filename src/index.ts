/**
 * csproj-forge: project descriptor generation for module-based source trees.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Scanning and module records
export * from './core/scan/index.js';
export * from './core/modules/index.js';

// Ownership and compile patterns
export * from './core/ownership/index.js';
export * from './core/patterns/index.js';

// Registry, rendering and variants
export * from './core/registry/index.js';
export * from './core/render/index.js';
export * from './core/variant/index.js';
export * from './core/templates/index.js';

// Pipeline
export * from './core/generator.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
