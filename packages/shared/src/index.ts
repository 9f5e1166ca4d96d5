// Database (Drizzle ORM - SINGLE SOURCE OF TRUTH)
export * from './db/index.js';

// Utilities
export * from './utils/logger.js';
