/**
 * Jest setup: runs before each test file loads the shared config.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
