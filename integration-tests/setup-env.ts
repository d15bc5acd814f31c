/**
 * Jest environment setup: keep structured logs out of test output
 * unless a level is requested explicitly.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
