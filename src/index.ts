/**
 * seo-signals
 *
 * Offline keyword density, content scoring and metadata helpers for page text.
 */

export * from './analysis/index.js';
export * from './metadata/index.js';
export * from './config/index.js';
export * from './observability/index.js';
