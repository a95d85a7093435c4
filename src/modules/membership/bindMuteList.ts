import { createLogger } from '@/lib/debug-logger';
import type { MembershipStoreApi } from './useMembershipStore';

const log = createLogger('[MembershipModule]');

export interface MuteListTarget {
  updateForMuteList: (newlyMutedAuthorIds: Iterable<string>) => void;
}

/**
 * Forward newly muted authors to a feed so their items disappear at once.
 * Unmutes are not forwarded: already delivered items are not brought back.
 *
 * @returns Unsubscribe function
 */
export function bindMuteList(target: MuteListTarget, store: MembershipStoreApi): () => void {
  return store.subscribe((state, previous) => {
    if (state.mutedAuthorIds === previous.mutedAuthorIds) return;

    const newlyMuted = [...state.mutedAuthorIds].filter(
      (authorId) => !previous.mutedAuthorIds.has(authorId)
    );
    if (newlyMuted.length === 0) return;

    log.debug(`Removing items from ${newlyMuted.length} newly muted author(s)`);
    target.updateForMuteList(newlyMuted);
  });
}
