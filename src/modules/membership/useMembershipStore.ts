/**
 * Membership Store
 *
 * Zustand store the caller fills from its session and mute-list subsystems.
 * The feed engine reads it synchronously through a MembershipOracle.
 *
 * Follow list and web of trust start as null (not loaded yet) and become
 * available asynchronously. Mute lists are kept per source (the user's own
 * list plus moderation lists) and merged.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type { MembershipOracle } from '@/types';

export const USER_MUTE_SOURCE = 'user';

interface MembershipState {
  selfAuthorId: string | null;

  /** Authors the user follows, null while the contact list is loading */
  followList: ReadonlySet<string> | null;

  /** Authors inside the web of trust, null while it is being computed */
  webOfTrust: ReadonlySet<string> | null;

  /** Mute lists indexed by the author that published them */
  mutedBySource: Record<string, ReadonlySet<string>>;

  /** Union of all mute lists */
  mutedAuthorIds: ReadonlySet<string>;
}

interface MembershipActions {
  setSelf: (authorId: string | null) => void;

  setFollowList: (authorIds: Iterable<string>) => void;

  setWebOfTrust: (authorIds: Iterable<string>) => void;

  /** Replace the mute list published by one source */
  setMuteList: (source: string, authorIds: Iterable<string>) => void;

  /** Add to the user's own mute list */
  mute: (authorId: string) => void;

  /** Remove from the user's own mute list */
  unmute: (authorId: string) => void;

  reset: () => void;
}

export type MembershipStore = MembershipState & MembershipActions;

export type MembershipStoreApi = StoreApi<MembershipStore>;

const initialState: MembershipState = {
  selfAuthorId: null,
  followList: null,
  webOfTrust: null,
  mutedBySource: {},
  mutedAuthorIds: new Set(),
};

function mergeMuteLists(mutedBySource: Record<string, ReadonlySet<string>>): ReadonlySet<string> {
  const combined = new Set<string>();
  for (const authorIds of Object.values(mutedBySource)) {
    for (const authorId of authorIds) {
      combined.add(authorId);
    }
  }
  return combined;
}

function withMuteList(
  state: MembershipState,
  source: string,
  authorIds: ReadonlySet<string>
): Pick<MembershipState, 'mutedBySource' | 'mutedAuthorIds'> {
  const mutedBySource = { ...state.mutedBySource, [source]: authorIds };
  return { mutedBySource, mutedAuthorIds: mergeMuteLists(mutedBySource) };
}

export function createMembershipStore(): MembershipStoreApi {
  return createStore<MembershipStore>()((set) => ({
    ...initialState,

    setSelf: (authorId) => set({ selfAuthorId: authorId }),

    setFollowList: (authorIds) => set({ followList: new Set(authorIds) }),

    setWebOfTrust: (authorIds) => set({ webOfTrust: new Set(authorIds) }),

    setMuteList: (source, authorIds) =>
      set((state) => withMuteList(state, source, new Set(authorIds))),

    mute: (authorId) =>
      set((state) => {
        const own = new Set(state.mutedBySource[USER_MUTE_SOURCE] ?? []);
        own.add(authorId);
        return withMuteList(state, USER_MUTE_SOURCE, own);
      }),

    unmute: (authorId) =>
      set((state) => {
        const own = new Set(state.mutedBySource[USER_MUTE_SOURCE] ?? []);
        own.delete(authorId);
        return withMuteList(state, USER_MUTE_SOURCE, own);
      }),

    reset: () => set({ ...initialState, mutedAuthorIds: new Set() }),
  }));
}

/**
 * Synchronous, read-only view of the store for the feed engine.
 */
export function toMembershipOracle(store: MembershipStoreApi): MembershipOracle {
  return {
    isMuted: (authorId) => store.getState().mutedAuthorIds.has(authorId),
    isInWebOfTrust: (authorId) => store.getState().webOfTrust?.has(authorId) ?? false,
    isWoTDataAvailable: () => store.getState().webOfTrust !== null,
    isFollowListAvailable: () => store.getState().followList !== null,
    followList: () => store.getState().followList ?? new Set<string>(),
    selfAuthorId: () => store.getState().selfAuthorId,
  };
}
