export * from './types.js';
export * from './config/calendar-data.js';
export * from './global/symbols.js';
export * from './global/global-market-fetcher.js';
export * from './sentiment/market-sentiment-meter.js';
export * from './calendar/macro-calendar.js';
export * from './passive/passive-fund-tracker.js';
export * from './sector/sector-event-monitor.js';
export * from './coupling/coupling-analyzer.js';
export * from './integrity/data-integrity-manager.js';
export * from './context.js';
