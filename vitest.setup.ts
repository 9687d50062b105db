/**
 * Vitest Setup File
 * Global test configuration
 */

// Keep test output free of log lines
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
