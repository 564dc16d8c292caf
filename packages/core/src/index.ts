/**
 * Memory Core
 *
 * Platform-agnostic pieces of the learning memory daemon: the record model,
 * embedding contract, similarity index, merge policy and ranking. Storage and
 * transport live in the server package.
 */

export const version = '0.1.0';

export * from './memory/index.js';
