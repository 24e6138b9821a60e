/**
 * Jest setup
 * Runs before each test file, ahead of any module reading the environment
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';
process.env.LOGGER_TYPE = 'console';
process.env.METRICS_TYPE = 'memory';
