/**
 * Pagination Controller
 *
 * "Load older" for the active session. Reissues the session's query bounded
 * by a watermark cursor and feeds the results through the aggregator's
 * batch pipeline under the same generation.
 *
 * Single-flight: while one page is loading for the current generation,
 * further loadMore calls are ignored.
 */

import type {
  ContentItem,
  ContentQuery,
  ContentSubscription,
  FeedFailureSource,
} from '@/types';
import { createLogger } from '@/lib/debug-logger';

const log = createLogger('[PaginationController]');

/**
 * What the controller needs from the aggregator that owns it.
 */
export interface PaginationHost<TPayload> {
  currentGeneration: () => number;
  /** Query of the current session, null when stopped, deferred or empty */
  activeQuery: () => ContentQuery | null;
  oldestVisibleTimestamp: () => number | null;
  openStream: (query: ContentQuery) => ContentSubscription<TPayload>;
  ingestBatch: (generation: number, items: ReadonlyArray<ContentItem<TPayload>>) => void;
  setLoadingMore: (loading: boolean) => void;
  reportFailure: (generation: number, source: FeedFailureSource, error: unknown) => void;
}

/**
 * Timestamps are whole seconds; items sharing the boundary second with the
 * oldest visible item may be skipped.
 */
export function watermarkCursor(oldestTimestamp: number): number {
  return oldestTimestamp - 1;
}

export class PaginationController<TPayload = unknown> {
  private inFlightGeneration: number | null = null;

  private subscription: ContentSubscription<TPayload> | null = null;

  constructor(private readonly host: PaginationHost<TPayload>) {}

  get isInFlight(): boolean {
    return this.inFlightGeneration !== null && this.inFlightGeneration === this.host.currentGeneration();
  }

  /**
   * Load the page older than the oldest visible item.
   * Resolves once the bounded stream has completed (immediately for a no-op).
   */
  async loadMore(): Promise<void> {
    const generation = this.host.currentGeneration();

    if (this.inFlightGeneration === generation) {
      log.debug('Skipping - page already loading');
      return;
    }

    const sessionQuery = this.host.activeQuery();
    if (!sessionQuery) {
      log.debug('Skipping - no active session');
      return;
    }

    const oldestTimestamp = this.host.oldestVisibleTimestamp();
    if (oldestTimestamp === null) {
      log.debug('Skipping - nothing visible yet');
      return;
    }

    const query: ContentQuery = {
      ...sessionQuery,
      until: watermarkCursor(oldestTimestamp),
      closeOnInitialSync: true,
    };

    this.inFlightGeneration = generation;
    this.host.setLoadingMore(true);
    log.debug(`Loading page until=${query.until} (generation ${generation})`);

    let subscription: ContentSubscription<TPayload> | null = null;
    try {
      subscription = this.host.openStream(query);
      this.subscription = subscription;

      for await (const batch of subscription.batches) {
        if (this.host.currentGeneration() !== generation) {
          return;
        }
        this.host.ingestBatch(generation, batch);
      }
    } catch (error) {
      this.host.reportFailure(generation, 'pagination', error);
    } finally {
      this.finish(generation, subscription);
    }
  }

  /**
   * Drop any in-flight page. Called when the owning session is superseded.
   */
  cancel(): void {
    this.subscription?.cancel();
    this.subscription = null;
    this.inFlightGeneration = null;
  }

  private finish(generation: number, subscription: ContentSubscription<TPayload> | null): void {
    if (subscription && this.subscription === subscription) {
      this.subscription = null;
    }
    if (this.inFlightGeneration !== generation) {
      return;
    }
    this.inFlightGeneration = null;
    this.host.setLoadingMore(false);
    log.debug(`Page complete (generation ${generation})`);
  }
}
