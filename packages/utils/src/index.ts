/**
 * @strata/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';

// Time utilities
export * from './time/timeframe';

// Math utilities
export * from './math/calculations';

// Validation utilities
export * from './validation/env-validator';

// Candle utilities
export * from './candle/candle-utils';
