// Content types
export interface ContentItem<TPayload = unknown> {
  /** Unique across the network, stable when a relay redelivers the item */
  id: string;
  authorId: string;
  kind: number;
  /** Author-claimed creation time in seconds (not receipt time) */
  timestamp: number;
  payload: TPayload;
}

/**
 * Raw signed event as delivered by the protocol client.
 * Only the fields the feed engine reads are typed.
 */
export interface ProtocolEvent {
  id: string;
  pubkey: string;
  kind: number;
  created_at: number;
  tags?: string[][];
  content?: string;
}

// Feed mode types
export interface CuratedPack {
  id: string;
  name: string;
  authorIds: string[];
  description?: string;
  creatorId?: string;
}

export type FeedMode =
  | { type: 'following' }
  | { type: 'single-relay'; url: string }
  | { type: 'curated-pack'; pack: CuratedPack }
  | { type: 'network-wide' }
  | { type: 'hashtag'; tag: string };

export type FeedModeType = FeedMode['type'];

// Query types
export type CachePolicy = 'cache-with-network' | 'network-only';

export interface RelaySelection {
  urls: string[];
  /** Only the listed relays are queried, never the client's default pool */
  exclusive: boolean;
}

export interface ContentQuery {
  kinds: number[];
  authors?: string[];
  /** Single-letter tag filters, e.g. `{ t: ['sunset'] }` */
  tags?: Record<string, string[]>;
  /** Upper bound (inclusive) on `timestamp`, in seconds */
  until?: number;
  limit: number;
  relays?: RelaySelection;
  cachePolicy: CachePolicy;
  /** Bounded queries end after the initial sync instead of staying open */
  closeOnInitialSync: boolean;
}

/**
 * Caller-supplied inputs that are combined with the feed mode to build a query.
 */
export interface FeedQueryInputs {
  kinds: number[];
  limit?: number;
}

// Stream types
export interface ContentSubscription<TPayload = unknown> {
  batches: AsyncIterable<ReadonlyArray<ContentItem<TPayload>>>;
  /** Resolves once the relays have delivered everything they had stored */
  initialSyncComplete?: Promise<void>;
  cancel: () => void;
}

export interface ContentStream<TPayload = unknown> {
  open: (query: ContentQuery) => ContentSubscription<TPayload>;
}

// Membership types
export interface MembershipOracle {
  isMuted: (authorId: string) => boolean;
  isInWebOfTrust: (authorId: string) => boolean;
  isWoTDataAvailable: () => boolean;
  isFollowListAvailable: () => boolean;
  followList: () => ReadonlySet<string>;
  /** The signed-in author, null when browsing signed out */
  selfAuthorId: () => string | null;
}

// Feed state types
export type FeedFailureSource = 'session' | 'pagination';

export interface FeedFailure {
  generation: number;
  source: FeedFailureSource;
  message: string;
}
