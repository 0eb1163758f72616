export * from './types.js';
export * from './errors.js';
export * from './yahoo-chart-client.js';
export * from './snapshot.js';
