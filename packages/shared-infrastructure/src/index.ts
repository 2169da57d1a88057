/**
 * @vibelist/shared-infrastructure
 *
 * Environment loading and typed env readers shared across the playlist packages.
 */
export * from './env/index.js';
