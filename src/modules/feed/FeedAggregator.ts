/**
 * Feed Aggregator
 *
 * Turns a live, batch-delivering content subscription into the list a
 * feed surface renders: deduplicated, filtered (mute list, web of trust)
 * and ordered newest first.
 *
 * Cancellation is cooperative. Every session gets a fresh generation number;
 * continuations (batches, timeouts, pagination pages, failures) capture it and
 * are dropped when it no longer matches. start() and stop() bump the
 * generation synchronously, before any queued continuation can run.
 */

import type {
  ContentItem,
  ContentQuery,
  ContentStream,
  ContentSubscription,
  FeedFailureSource,
  FeedMode,
  FeedQueryInputs,
  MembershipOracle,
} from '@/types';
import { createLogger } from '@/lib/debug-logger';
import { resolveFeedEngineConfig, type FeedEngineConfig } from './config';
import { feedKindsFor } from './contentKinds';
import { diversifiedInsertionIndex, insertionIndex } from './feedOrdering';
import { feedModeDisplayName, feedModesEqual } from './feedMode';
import { resolveFeedQuery, shouldPreserveOnSwitch } from './ModeSelector';
import { PaginationController } from './PaginationController';
import { createFeedStore, type FeedStateReader, type FeedStoreApi } from './useFeedStore';

const log = createLogger('[FeedAggregator]');

export interface FeedAggregatorOptions<TPayload> {
  stream: ContentStream<TPayload>;
  membership: MembershipOracle;
  /** Inputs used by switchMode before any explicit start (default: home surface kinds) */
  defaultQueryInputs?: FeedQueryInputs;
  config?: Partial<FeedEngineConfig>;
}

/**
 * State of one aggregation run. Owned by the aggregator, never shared.
 */
interface FeedSession<TPayload> {
  mode: FeedMode;
  inputs: FeedQueryInputs;
  generation: number;
  /** Null while deferred or when the mode resolved to nothing */
  query: ContentQuery | null;
  visibleItems: ContentItem<TPayload>[];
  seenIds: Set<string>;
  hasReceivedBatch: boolean;
  subscription: ContentSubscription<TPayload> | null;
  loadingTimeout: ReturnType<typeof setTimeout> | null;
}

export class FeedAggregator<TPayload = unknown> {
  readonly store: FeedStateReader<TPayload>;

  private readonly feedStore: FeedStoreApi<TPayload>;

  private readonly stream: ContentStream<TPayload>;

  private readonly membership: MembershipOracle;

  private readonly config: FeedEngineConfig;

  private readonly pagination: PaginationController<TPayload>;

  private readonly defaultQueryInputs: FeedQueryInputs;

  private generation = 0;

  private session: FeedSession<TPayload> | null = null;

  constructor(options: FeedAggregatorOptions<TPayload>) {
    this.stream = options.stream;
    this.membership = options.membership;
    this.config = resolveFeedEngineConfig(options.config);
    this.defaultQueryInputs = options.defaultQueryInputs ?? { kinds: feedKindsFor('home') };
    this.feedStore = createFeedStore<TPayload>();
    this.store = this.feedStore;

    this.pagination = new PaginationController<TPayload>({
      currentGeneration: () => this.generation,
      activeQuery: () => {
        const session = this.currentSession();
        return session ? session.query : null;
      },
      oldestVisibleTimestamp: () => {
        const items = this.currentSession()?.visibleItems ?? [];
        return items.length > 0 ? items[items.length - 1].timestamp : null;
      },
      openStream: (query) => this.stream.open(query),
      ingestBatch: (generation, items) => this.ingestBatch(generation, items),
      setLoadingMore: (loading) => this.feedStore.getState().setLoadingMore(loading),
      reportFailure: (generation, source, error) => this.reportFailure(generation, source, error),
    });
  }

  get currentMode(): FeedMode | null {
    return this.session?.mode ?? null;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /**
   * Start a new session, superseding the current one.
   *
   * @param preserveExisting Keep the current list on screen (only meaningful
   *   between modes whose content overlaps)
   */
  start(mode: FeedMode, queryInputs: FeedQueryInputs, preserveExisting = false): void {
    this.supersede();
    const generation = this.generation;

    const preserved = preserveExisting ? [...(this.session?.visibleItems ?? [])] : [];
    const session: FeedSession<TPayload> = {
      mode,
      inputs: { ...queryInputs, kinds: [...queryInputs.kinds] },
      generation,
      query: null,
      visibleItems: preserved,
      seenIds: new Set(preserved.map((item) => item.id)),
      hasReceivedBatch: false,
      subscription: null,
      loadingTimeout: null,
    };
    this.session = session;

    const resolution = resolveFeedQuery(mode, queryInputs, this.membership, this.config.pageLimit);

    if (resolution.status === 'deferred') {
      log.debug(`${feedModeDisplayName(mode)}: deferred (${resolution.reason})`);
      this.feedStore.getState().beginSession(mode, [...preserved], true);
      return;
    }

    if (resolution.status === 'empty') {
      log.debug(`${feedModeDisplayName(mode)}: nothing to subscribe to (${resolution.reason})`);
      this.feedStore.getState().beginSession(mode, [...preserved], false);
      return;
    }

    session.query = resolution.query;
    this.feedStore.getState().beginSession(mode, [...preserved], preserved.length === 0);
    this.scheduleLoadingTimeout(session);
    log.debug(`${feedModeDisplayName(mode)}: opening stream (generation ${generation})`);

    let subscription: ContentSubscription<TPayload>;
    try {
      subscription = this.stream.open(resolution.query);
    } catch (error) {
      this.reportFailure(generation, 'session', error);
      return;
    }

    session.subscription = subscription;
    void subscription.initialSyncComplete?.then(
      () => this.handleInitialSyncComplete(generation),
      (error: unknown) => log.debug('Initial sync signal rejected', error)
    );
    void this.consume(session, subscription);
  }

  /**
   * Tear down the current session. Items stay visible. Idempotent.
   */
  stop(): void {
    this.supersede();
    const state = this.feedStore.getState();
    state.setLoading(false);
    state.setLoadingMore(false);
  }

  /**
   * Switch to another mode with the inputs of the last session.
   * No-op when the mode is unchanged.
   */
  switchMode(newMode: FeedMode): void {
    const previous = this.session?.mode ?? null;
    if (previous && feedModesEqual(previous, newMode)) {
      return;
    }

    const inputs = this.session?.inputs ?? this.defaultQueryInputs;
    this.stop();
    this.start(newMode, inputs, shouldPreserveOnSwitch(previous, newMode));
  }

  /**
   * Load items older than the oldest visible one into the same list.
   */
  loadMore(): Promise<void> {
    return this.pagination.loadMore();
  }

  /**
   * Remove items by authors that were just muted.
   * seenIds is left alone: unmuting does not bring delivered items back.
   */
  updateForMuteList(newlyMutedAuthorIds: Iterable<string>): void {
    const muted = new Set(newlyMutedAuthorIds);
    if (muted.size === 0) return;
    this.removeWhere((item) => muted.has(item.authorId));
  }

  /**
   * Retroactively drop network-wide items from authors outside the web of
   * trust. Never runs by itself; callers invoke it once WoT data arrives.
   *
   * @returns Number of items removed
   */
  filterByWebOfTrust(): number {
    if (this.session?.mode.type !== 'network-wide') return 0;
    if (!this.membership.isWoTDataAvailable()) return 0;
    return this.removeWhere((item) => !this.membership.isInWebOfTrust(item.authorId));
  }

  // ============= Session internals =============

  private currentSession(): FeedSession<TPayload> | null {
    const session = this.session;
    return session && session.generation === this.generation ? session : null;
  }

  private isCurrent(generation: number): boolean {
    return generation === this.generation;
  }

  private supersede(): void {
    this.generation += 1;
    this.pagination.cancel();

    const session = this.session;
    if (!session) return;

    this.clearLoadingTimeout(session);
    if (session.subscription) {
      session.subscription.cancel();
      session.subscription = null;
    }
  }

  private scheduleLoadingTimeout(session: FeedSession<TPayload>): void {
    const { generation } = session;
    session.loadingTimeout = setTimeout(() => {
      session.loadingTimeout = null;
      if (!this.isCurrent(generation)) return;
      log.debug(`Loading timeout after ${this.config.loadingTimeoutMs}ms (generation ${generation})`);
      this.feedStore.getState().setLoading(false);
    }, this.config.loadingTimeoutMs);
  }

  private clearLoadingTimeout(session: FeedSession<TPayload>): void {
    if (session.loadingTimeout !== null) {
      clearTimeout(session.loadingTimeout);
      session.loadingTimeout = null;
    }
  }

  private handleInitialSyncComplete(generation: number): void {
    const session = this.currentSession();
    if (!session || session.generation !== generation) return;
    if (session.hasReceivedBatch) return;

    // Relays had nothing stored: resolve like an empty result
    this.clearLoadingTimeout(session);
    this.feedStore.getState().setLoading(false);
  }

  private async consume(
    session: FeedSession<TPayload>,
    subscription: ContentSubscription<TPayload>
  ): Promise<void> {
    const { generation } = session;
    try {
      for await (const batch of subscription.batches) {
        if (!this.isCurrent(generation)) {
          return;
        }
        this.ingestBatch(generation, batch);
      }
      if (this.isCurrent(generation)) {
        log.debug(`Stream ended (generation ${generation})`);
      }
    } catch (error) {
      this.reportFailure(generation, 'session', error);
    }
  }

  /**
   * Batch pipeline shared by the live stream and pagination pages.
   */
  private ingestBatch(generation: number, items: ReadonlyArray<ContentItem<TPayload>>): void {
    const session = this.currentSession();
    if (!session || session.generation !== generation) {
      return;
    }

    if (!session.hasReceivedBatch) {
      session.hasReceivedBatch = true;
      this.clearLoadingTimeout(session);
    }

    const filterByTrust =
      session.mode.type === 'network-wide' && this.membership.isWoTDataAvailable();

    let admitted = 0;
    for (const item of items) {
      if (session.seenIds.has(item.id)) continue;
      session.seenIds.add(item.id);

      if (this.membership.isMuted(item.authorId)) continue;
      if (filterByTrust && !this.membership.isInWebOfTrust(item.authorId)) continue;

      const index = this.config.diversify
        ? diversifiedInsertionIndex(session.visibleItems, item, this.config.maxConsecutive)
        : insertionIndex(session.visibleItems, item);
      session.visibleItems.splice(index, 0, item);
      admitted += 1;
    }

    log.debug(`Batch: ${items.length} received, ${admitted} admitted, ${session.visibleItems.length} visible`);
    this.feedStore.getState().publishItems([...session.visibleItems]);
  }

  private removeWhere(predicate: (item: ContentItem<TPayload>) => boolean): number {
    const session = this.session;
    const current = session ? session.visibleItems : this.feedStore.getState().visibleItems;
    const kept = current.filter((item) => !predicate(item));
    const removed = current.length - kept.length;
    if (removed === 0) return 0;

    if (session) {
      session.visibleItems = kept;
    }
    this.feedStore.getState().replaceItems([...kept]);
    return removed;
  }

  private reportFailure(generation: number, source: FeedFailureSource, error: unknown): void {
    if (!this.isCurrent(generation)) {
      return;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    log.error(`${source} stream failed (generation ${generation}): ${message}`);
    this.feedStore.getState().setFailure({ generation, source, message });
  }
}
