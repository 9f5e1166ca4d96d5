// Test setup file for vitest

process.env.NODE_ENV = 'test';
process.env.DATABASE_PATH = ':memory:';

// Suppress noisy logs during tests
process.env.LOG_LEVEL = 'error';
