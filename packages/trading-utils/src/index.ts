export * from './types.js';
export * from './indicators/rsi.js';
export * from './indicators/volatility.js';
export * from './indicators/breadth.js';
