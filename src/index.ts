/**
 * pydocsmith package entrypoint (library-safe exports only)
 */

export * from './core/index.js';
export * from './docstrings/index.js';
