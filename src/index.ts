/**
 * matrix-brain library exports.
 */

// Configuration
export * from './core/config/index.js';

// Matrix store
export * from './core/matrix/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
