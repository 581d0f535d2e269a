/**
 * Shared types for the vocabulary trainer store
 */

export * from './core.js';
export * from './database.js';
