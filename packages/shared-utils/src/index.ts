export * from './logger.js';
export * from './env.js';
export * from './date.js';
export * from './ttl-cache.js';
export * from './concurrency.js';
