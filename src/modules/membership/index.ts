/**
 * Membership Module
 *
 * Who the user follows, trusts and mutes, as seen by the feed engine.
 */

export {
  createMembershipStore,
  toMembershipOracle,
  USER_MUTE_SOURCE,
} from './useMembershipStore';
export type { MembershipStore, MembershipStoreApi } from './useMembershipStore';
export { bindMuteList } from './bindMuteList';
export type { MuteListTarget } from './bindMuteList';
