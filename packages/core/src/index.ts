/**
 * @pgdesk/core
 *
 * Zero-dependency building blocks for the PostgreSQL console.
 * Uses only Node.js built-in modules.
 *
 * @packageDocumentation
 */

// Types and structured errors
export * from './types/index.js';

// Services (ServiceRegistry, logging, error utilities)
export * from './services/index.js';

// SQL identifiers, statement builders, value handling
export * from './sql/index.js';

// Backup, restore and archive helpers
export * from './maintenance/index.js';

// Version
export const VERSION = '0.1.0';
