/**
 * Core module exports
 */

export * from './logger.js';
export * from './errors.js';
export * from './fileio.js';
export * from './config.js';
export * from './concurrency.js';
export * from './profile.js';
