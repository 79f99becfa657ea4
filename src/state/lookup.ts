/**
 * Resolves a user-typed item reference to a hunt item
 */

import type { HuntItem } from '../types/hunt.js';

const MIN_ID_PREFIX = 4;

/**
 * Accepts a 1-based list position ("3") or an id prefix of at least
 * four characters. Returns undefined when nothing or more than one item matches.
 */
export function resolveItemRef<T extends Pick<HuntItem, 'id'>>(
  items: readonly T[],
  ref: string,
): T | undefined {
  const trimmed = ref.trim();

  if (/^\d+$/.test(trimmed)) {
    const position = parseInt(trimmed, 10);
    return position >= 1 ? items[position - 1] : undefined;
  }

  if (trimmed.length < MIN_ID_PREFIX) return undefined;

  const needle = trimmed.toLowerCase();
  const matches = items.filter(item => item.id.toLowerCase().startsWith(needle));
  return matches.length === 1 ? matches[0] : undefined;
}
