export * from './types.js';
export * from './weights/dynamic-weight-optimizer.js';
export * from './weights/weight-optimizer.js';
export * from './weights/robustness-tester.js';
export * from './validation/final-signal-validator.js';
export * from './validation/fusion-details.js';
export * from './execution/execution-simulator.js';
