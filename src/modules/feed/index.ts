/**
 * Feed Module
 *
 * Streaming feed aggregation shared by every feed surface:
 * - Session lifecycle and cancellation (FeedAggregator)
 * - "Load older" pagination (PaginationController)
 * - Mode to query mapping (ModeSelector)
 */

// Re-export public API
export { FeedAggregator } from './FeedAggregator';
export type { FeedAggregatorOptions } from './FeedAggregator';
export { PaginationController, watermarkCursor } from './PaginationController';
export type { PaginationHost } from './PaginationController';
export { resolveFeedQuery, normalizeHashtag, shouldPreserveOnSwitch } from './ModeSelector';
export type { QueryResolution } from './ModeSelector';
export { createFeedStore } from './useFeedStore';
export type { FeedState, FeedStateReader, FeedStore, FeedStoreApi } from './useFeedStore';
export { compareByRecency, insertionIndex, diversifiedInsertionIndex } from './feedOrdering';
export {
  feedModesEqual,
  feedModeDisplayName,
  encodeFeedMode,
  decodeFeedMode,
} from './feedMode';
export { CONTENT_KINDS, feedKindsFor, toContentItem } from './contentKinds';
export type { FeedSurface, FeedKindOptions } from './contentKinds';
export { DEFAULT_FEED_ENGINE_CONFIG, resolveFeedEngineConfig } from './config';
export type { FeedEngineConfig } from './config';
