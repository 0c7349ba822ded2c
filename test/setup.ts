/**
 * Vitest setup file
 * Sets environment variables before any test modules are imported
 */

// Silence engine logging during tests
process.env.JSON_LOG_LEVEL = 'none';
