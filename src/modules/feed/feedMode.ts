/**
 * Feed Mode helpers
 *
 * Equality, display names and the JSON form a caller persists to restore
 * the last selected mode.
 */

import type { CuratedPack, FeedMode } from '@/types';

function sameAuthors(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((authorId, index) => authorId === b[index]);
}

function packsEqual(a: CuratedPack, b: CuratedPack): boolean {
  return (
    a.id === b.id &&
    a.name === b.name &&
    a.description === b.description &&
    a.creatorId === b.creatorId &&
    sameAuthors(a.authorIds, b.authorIds)
  );
}

/**
 * Structural equality: same mode type and same parameters.
 */
export function feedModesEqual(a: FeedMode, b: FeedMode): boolean {
  switch (a.type) {
    case 'following':
    case 'network-wide':
      return b.type === a.type;
    case 'single-relay':
      return b.type === 'single-relay' && b.url === a.url;
    case 'curated-pack':
      return b.type === 'curated-pack' && packsEqual(a.pack, b.pack);
    case 'hashtag':
      return b.type === 'hashtag' && b.tag === a.tag;
  }
}

export function feedModeDisplayName(mode: FeedMode): string {
  switch (mode.type) {
    case 'following':
      return 'Following';
    case 'single-relay':
      return 'Relay';
    case 'curated-pack':
      return mode.pack.name;
    case 'network-wide':
      return 'Network';
    case 'hashtag':
      return `#${mode.tag}`;
  }
}

// ============= Serialization =============

interface SerializedPack {
  id: string;
  name: string;
  authorIds: string[];
  description?: string;
  creatorId?: string;
}

type SerializedFeedMode =
  | { type: 'following' }
  | { type: 'single-relay'; relayUrl: string }
  | { type: 'curated-pack'; pack: SerializedPack }
  | { type: 'network-wide' }
  | { type: 'hashtag'; hashtag: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Invalid feed mode: "${key}" must be a non-empty string`);
  }
  return value;
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Invalid feed mode: "${key}" must be a string`);
  }
  return value;
}

function decodePack(value: unknown): CuratedPack {
  if (!isRecord(value)) {
    throw new Error('Invalid feed mode: "pack" must be an object');
  }
  const authorIds = value.authorIds;
  if (!Array.isArray(authorIds) || !authorIds.every((id): id is string => typeof id === 'string')) {
    throw new Error('Invalid feed mode: "pack.authorIds" must be a list of strings');
  }
  const pack: CuratedPack = {
    id: requireString(value, 'id'),
    name: requireString(value, 'name'),
    authorIds: [...authorIds],
  };
  const description = optionalString(value, 'description');
  const creatorId = optionalString(value, 'creatorId');
  if (description !== undefined) pack.description = description;
  if (creatorId !== undefined) pack.creatorId = creatorId;
  return pack;
}

function toSerialized(mode: FeedMode): SerializedFeedMode {
  switch (mode.type) {
    case 'following':
    case 'network-wide':
      return { type: mode.type };
    case 'single-relay':
      return { type: 'single-relay', relayUrl: mode.url };
    case 'curated-pack':
      return { type: 'curated-pack', pack: { ...mode.pack, authorIds: [...mode.pack.authorIds] } };
    case 'hashtag':
      return { type: 'hashtag', hashtag: mode.tag };
  }
}

export function encodeFeedMode(mode: FeedMode): string {
  return JSON.stringify(toSerialized(mode));
}

/**
 * Parse a mode previously written by encodeFeedMode.
 * Throws on malformed JSON, unknown mode types or missing parameters.
 */
export function decodeFeedMode(raw: string): FeedMode {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(`Invalid feed mode: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new Error('Invalid feed mode: expected an object');
  }

  const type = parsed.type;
  switch (type) {
    case 'following':
      return { type: 'following' };
    case 'network-wide':
      return { type: 'network-wide' };
    case 'single-relay':
      return { type: 'single-relay', url: requireString(parsed, 'relayUrl') };
    case 'curated-pack':
      return { type: 'curated-pack', pack: decodePack(parsed.pack) };
    case 'hashtag':
      return { type: 'hashtag', tag: requireString(parsed, 'hashtag') };
    default:
      throw new Error(`Invalid feed mode: unknown type "${String(type)}"`);
  }
}
