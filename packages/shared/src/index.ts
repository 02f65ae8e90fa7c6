export * from './config.js';
export * from './logger.js';
export * from './errors.js';
export * from './schemas.js';
export * from './artifacts.js';
export * from './json-repair.js';
export * from './oracle.js';
export * from './pool.js';
export { slugify } from './slug.js';
export { withRetry, isRetryableError, sleep, type RetryOptions } from './retry.js';
