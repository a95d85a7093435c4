/**
 * Feed Store
 *
 * Zustand store holding what a caller renders for one feed: the visible list
 * and the loading flags. Each FeedAggregator owns its own store instance, so
 * several surfaces (home, video, profile...) can run side by side.
 *
 * Only the aggregator writes; callers read through FeedStateReader.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { ContentItem, FeedFailure, FeedMode } from '@/types';

export interface FeedState<TPayload = unknown> {
  /** Mode of the current (or last) session */
  mode: FeedMode | null;

  /** Newest first, no duplicate ids */
  visibleItems: ContentItem<TPayload>[];

  /** True from session start until the first batch, the end of initial sync or the loading timeout */
  isLoading: boolean;

  /** Whether a load-more request is in flight */
  isLoadingMore: boolean;

  /** Terminal stream failure of the current session, if any */
  failure: FeedFailure | null;
}

interface FeedActions<TPayload> {
  /** Replace the whole state at session start */
  beginSession: (mode: FeedMode, visibleItems: ContentItem<TPayload>[], isLoading: boolean) => void;

  /** Publish the list after a batch and resolve the loading state */
  publishItems: (visibleItems: ContentItem<TPayload>[]) => void;

  /** Publish the list after a local removal (mute list, web of trust) */
  replaceItems: (visibleItems: ContentItem<TPayload>[]) => void;

  setLoading: (loading: boolean) => void;

  setLoadingMore: (loading: boolean) => void;

  setFailure: (failure: FeedFailure | null) => void;

  reset: () => void;
}

export type FeedStore<TPayload = unknown> = FeedState<TPayload> & FeedActions<TPayload>;

export type FeedStoreApi<TPayload = unknown> = StoreApi<FeedStore<TPayload>>;

/**
 * Read-only view handed to callers.
 */
export interface FeedStateReader<TPayload = unknown> {
  getState: () => FeedState<TPayload>;
  subscribe: (listener: (state: FeedState<TPayload>, previous: FeedState<TPayload>) => void) => () => void;
}

function initialState<TPayload>(): FeedState<TPayload> {
  return {
    mode: null,
    visibleItems: [],
    isLoading: false,
    isLoadingMore: false,
    failure: null,
  };
}

export function createFeedStore<TPayload = unknown>(): FeedStoreApi<TPayload> {
  return createStore<FeedStore<TPayload>>()((set) => ({
    ...initialState<TPayload>(),

    beginSession: (mode, visibleItems, isLoading) =>
      set({
        mode,
        visibleItems,
        isLoading,
        isLoadingMore: false,
        failure: null,
      }),

    publishItems: (visibleItems) => set({ visibleItems, isLoading: false }),

    replaceItems: (visibleItems) => set({ visibleItems }),

    setLoading: (loading) => set({ isLoading: loading }),

    setLoadingMore: (loading) => set({ isLoadingMore: loading }),

    setFailure: (failure) => set({ failure }),

    reset: () => set(initialState<TPayload>()),
  }));
}
