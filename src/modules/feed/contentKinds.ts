import type { ContentItem, ProtocolEvent } from '@/types';

export const CONTENT_KINDS = {
  picture: 20,
  shortVideo: 22,
  addressableShortVideo: 34236,
} as const;

export type FeedSurface = 'home' | 'video' | 'profile' | 'explore' | 'trending';

export interface FeedKindOptions {
  /** Mix short videos into picture surfaces (default: true) */
  showVideos?: boolean;
}

/**
 * Content kinds a feed surface subscribes to.
 */
export function feedKindsFor(surface: FeedSurface, options: FeedKindOptions = {}): number[] {
  if (surface === 'video') {
    return [CONTENT_KINDS.shortVideo, CONTENT_KINDS.addressableShortVideo];
  }
  const kinds: number[] = [CONTENT_KINDS.picture];
  if (options.showVideos ?? true) {
    kinds.push(CONTENT_KINDS.shortVideo);
  }
  return kinds;
}

/**
 * Normalize a protocol event into a ContentItem.
 * The event itself is kept as the opaque payload.
 */
export function toContentItem(event: ProtocolEvent): ContentItem<ProtocolEvent> {
  return {
    id: event.id,
    authorId: event.pubkey,
    kind: event.kind,
    timestamp: Math.floor(event.created_at),
    payload: event,
  };
}
