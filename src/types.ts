/**
 * Skiff Shared Types
 * Source locations, AST nodes, tokens and errors in one import.
 */

export * from './source-location.js';
export * from './ast-nodes.js';
export * from './token-types.js';
export * from './error-registry.js';
export * from './error-classes.js';
