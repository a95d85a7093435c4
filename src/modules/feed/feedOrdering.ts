/**
 * Ordering rules for the visible list.
 *
 * The list is kept newest first. Items sharing a timestamp are ordered by id
 * so that the position of an item never depends on delivery order.
 */

import type { ContentItem } from '@/types';

export function compareByRecency(a: ContentItem, b: ContentItem): number {
  if (a.timestamp !== b.timestamp) {
    return b.timestamp - a.timestamp;
  }
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Binary search for the position that keeps `items` sorted by recency.
 */
export function insertionIndex(items: readonly ContentItem[], item: ContentItem): number {
  let low = 0;
  let high = items.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compareByRecency(item, items[mid]) < 0) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  return low;
}

/**
 * Insertion position with same-author burst avoidance.
 *
 * Once `maxConsecutive` items from the new item's author sit directly above
 * its natural position, the item is pushed down exponentially (2, 4, 8...).
 */
export function diversifiedInsertionIndex(
  items: readonly ContentItem[],
  item: ContentItem,
  maxConsecutive = 3
): number {
  const natural = insertionIndex(items, item);

  let consecutive = 0;
  for (let i = natural - 1; i >= 0; i -= 1) {
    if (items[i].authorId !== item.authorId) break;
    consecutive += 1;
  }

  if (consecutive < maxConsecutive) return natural;

  const offset = 2 ** (consecutive - maxConsecutive + 1);
  return Math.min(natural + offset, items.length);
}
