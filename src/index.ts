/**
 * Feed engine public API.
 */

export * from './modules/feed';
export * from './modules/membership';
export * from './lib/debug-logger';
export type * from './types';
