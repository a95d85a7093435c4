import { describe, it, expect } from 'vitest';
import { decodeFeedMode, encodeFeedMode, feedModeDisplayName, feedModesEqual } from './feedMode';
import type { CuratedPack, FeedMode } from '@/types';

const pack: CuratedPack = {
  id: 'pack-1',
  name: 'Street Photographers',
  authorIds: ['alice', 'bob'],
  creatorId: 'carol',
};

describe('feedModesEqual', () => {
  it('treats parameterless modes of the same type as equal', () => {
    expect(feedModesEqual({ type: 'following' }, { type: 'following' })).toBe(true);
    expect(feedModesEqual({ type: 'network-wide' }, { type: 'network-wide' })).toBe(true);
    expect(feedModesEqual({ type: 'following' }, { type: 'network-wide' })).toBe(false);
  });

  it('compares relay urls', () => {
    const relay: FeedMode = { type: 'single-relay', url: 'wss://relay.example.com' };
    expect(feedModesEqual(relay, { type: 'single-relay', url: 'wss://relay.example.com' })).toBe(true);
    expect(feedModesEqual(relay, { type: 'single-relay', url: 'wss://other.example.com' })).toBe(false);
  });

  it('compares packs by content', () => {
    const mode: FeedMode = { type: 'curated-pack', pack };
    expect(feedModesEqual(mode, { type: 'curated-pack', pack: { ...pack, authorIds: ['alice', 'bob'] } })).toBe(true);
    expect(feedModesEqual(mode, { type: 'curated-pack', pack: { ...pack, authorIds: ['alice'] } })).toBe(false);
    expect(feedModesEqual(mode, { type: 'curated-pack', pack: { ...pack, name: 'Renamed' } })).toBe(false);
  });

  it('compares hashtags', () => {
    expect(feedModesEqual({ type: 'hashtag', tag: 'sunset' }, { type: 'hashtag', tag: 'sunset' })).toBe(true);
    expect(feedModesEqual({ type: 'hashtag', tag: 'sunset' }, { type: 'hashtag', tag: 'sunrise' })).toBe(false);
  });
});

describe('feedModeDisplayName', () => {
  it('names every mode', () => {
    expect(feedModeDisplayName({ type: 'following' })).toBe('Following');
    expect(feedModeDisplayName({ type: 'single-relay', url: 'wss://relay.example.com' })).toBe('Relay');
    expect(feedModeDisplayName({ type: 'curated-pack', pack })).toBe('Street Photographers');
    expect(feedModeDisplayName({ type: 'network-wide' })).toBe('Network');
    expect(feedModeDisplayName({ type: 'hashtag', tag: 'sunset' })).toBe('#sunset');
  });
});

describe('encodeFeedMode / decodeFeedMode', () => {
  it('writes the relay url under relayUrl', () => {
    expect(encodeFeedMode({ type: 'single-relay', url: 'wss://relay.example.com' })).toBe(
      '{"type":"single-relay","relayUrl":"wss://relay.example.com"}'
    );
  });

  it('restores a pack mode', () => {
    const mode: FeedMode = { type: 'curated-pack', pack };
    expect(decodeFeedMode(encodeFeedMode(mode))).toEqual(mode);
  });

  it('restores a hashtag mode', () => {
    expect(decodeFeedMode('{"type":"hashtag","hashtag":"sunset"}')).toEqual({ type: 'hashtag', tag: 'sunset' });
  });

  it('rejects malformed json', () => {
    expect(() => decodeFeedMode('{not json')).toThrow(/^Invalid feed mode:/);
  });

  it('rejects unknown types', () => {
    expect(() => decodeFeedMode('{"type":"trending"}')).toThrow('Invalid feed mode: unknown type "trending"');
  });

  it('rejects a relay mode without url', () => {
    expect(() => decodeFeedMode('{"type":"single-relay"}')).toThrow(
      'Invalid feed mode: "relayUrl" must be a non-empty string'
    );
  });

  it('rejects a pack with non-string members', () => {
    expect(() =>
      decodeFeedMode('{"type":"curated-pack","pack":{"id":"p","name":"n","authorIds":[1]}}')
    ).toThrow('Invalid feed mode: "pack.authorIds" must be a list of strings');
  });

  it('rejects non-object input', () => {
    expect(() => decodeFeedMode('[]')).toThrow('Invalid feed mode: expected an object');
  });
});
