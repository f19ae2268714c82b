/**
 * Library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Catalog
export * from './core/catalog/index.js';

// Installer
export * from './core/installer/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
