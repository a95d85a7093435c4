/**
 * Mode Selector
 *
 * Maps a feed mode to the concrete query a ContentStream can open.
 * Does not watch for prerequisites: when the follow list is still loading
 * the result is 'deferred' and the caller re-invokes start once it is ready.
 */

import type { ContentQuery, FeedMode, FeedQueryInputs, MembershipOracle } from '@/types';

export type QueryResolution =
  | { status: 'ready'; query: ContentQuery }
  | { status: 'deferred'; reason: 'follow-list-pending' }
  | { status: 'empty'; reason: 'no-authors' | 'no-tag' };

/**
 * Hashtags are matched lower-cased and without the leading '#'.
 */
export function normalizeHashtag(tag: string): string {
  return tag.trim().replace(/^#+/, '').toLowerCase();
}

function baseQuery(inputs: FeedQueryInputs, defaultLimit: number): ContentQuery {
  return {
    kinds: [...inputs.kinds],
    limit: inputs.limit ?? defaultLimit,
    cachePolicy: 'cache-with-network',
    closeOnInitialSync: false,
  };
}

function followingAuthors(membership: MembershipOracle): string[] {
  const authors = [...membership.followList()];
  const self = membership.selfAuthorId();
  if (self && !authors.includes(self)) {
    authors.push(self);
  }
  return authors;
}

export function resolveFeedQuery(
  mode: FeedMode,
  inputs: FeedQueryInputs,
  membership: MembershipOracle,
  defaultLimit: number
): QueryResolution {
  const query = baseQuery(inputs, defaultLimit);

  switch (mode.type) {
    case 'following': {
      if (!membership.isFollowListAvailable()) {
        return { status: 'deferred', reason: 'follow-list-pending' };
      }
      // An empty follow list means nothing to show, even though self would be added
      if (membership.followList().size === 0) {
        return { status: 'empty', reason: 'no-authors' };
      }
      return { status: 'ready', query: { ...query, authors: followingAuthors(membership) } };
    }

    case 'single-relay':
      return {
        status: 'ready',
        query: {
          ...query,
          relays: { urls: [mode.url], exclusive: true },
          cachePolicy: 'network-only',
        },
      };

    case 'curated-pack': {
      const authors = [...new Set(mode.pack.authorIds)];
      if (authors.length === 0) {
        return { status: 'empty', reason: 'no-authors' };
      }
      return { status: 'ready', query: { ...query, authors } };
    }

    case 'network-wide':
      return { status: 'ready', query };

    case 'hashtag': {
      const tag = normalizeHashtag(mode.tag);
      if (!tag) {
        return { status: 'empty', reason: 'no-tag' };
      }
      return { status: 'ready', query: { ...query, tags: { t: [tag] } } };
    }
  }
}

/**
 * Only broadening from the follow graph to the whole network keeps the
 * current list on screen; every other switch starts from an empty list.
 */
export function shouldPreserveOnSwitch(previous: FeedMode | null, next: FeedMode): boolean {
  return previous?.type === 'following' && next.type === 'network-wide';
}
