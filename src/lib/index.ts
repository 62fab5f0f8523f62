/**
 * Shared library utilities.
 */

export * from './errors.js';
export * from './logger.js';
export * from './env.js';
