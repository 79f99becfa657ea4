/**
 * Conversion between hunt records and the JSON stored in hunt.json
 */

import type { HuntItem, StoredHuntItem } from '../types/hunt.js';
import { errorMessage } from '../errors.js';

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export function toStored(item: HuntItem): StoredHuntItem {
  const stored: StoredHuntItem = {
    id: item.id,
    title: item.title,
    hint: item.hint,
    found: item.found,
  };
  if (item.photoData !== undefined) stored.photoData = Buffer.from(item.photoData).toString('base64');
  if (item.foundAt !== undefined) stored.foundAt = item.foundAt.toISOString();
  if (item.address !== undefined) stored.address = item.address;
  return stored;
}

export function fromStored(stored: StoredHuntItem): HuntItem {
  const item: HuntItem = {
    id: stored.id,
    title: stored.title,
    hint: stored.hint,
    found: stored.found,
  };
  if (stored.photoData !== undefined) {
    item.photoData = new Uint8Array(Buffer.from(stored.photoData, 'base64'));
  }
  if (stored.foundAt !== undefined) item.foundAt = new Date(stored.foundAt);
  if (stored.address !== undefined) item.address = stored.address;
  return item;
}

export function encodeItems(items: readonly HuntItem[]): string {
  return JSON.stringify(items.map(toStored), null, 2);
}

/**
 * Parse hunt.json content. Throws DecodeError on anything that is not a
 * well-formed record list.
 */
export function decodeItems(text: string): HuntItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`invalid JSON (${errorMessage(err)})`);
  }

  if (!Array.isArray(parsed)) {
    throw new DecodeError('expected an array of hunt items');
  }

  const seen = new Set<string>();
  return parsed.map((entry: unknown, index) => {
    if (!isStoredItem(entry)) {
      throw new DecodeError(`item ${index} is not a valid hunt item`);
    }
    if (seen.has(entry.id)) {
      throw new DecodeError(`duplicate id ${entry.id}`);
    }
    seen.add(entry.id);
    return fromStored(entry);
  });
}

function isStoredItem(obj: unknown): obj is StoredHuntItem {
  if (typeof obj !== 'object' || obj === null) return false;
  const item = obj as Record<string, unknown>;
  return (
    typeof item.id === 'string' &&
    item.id.length > 0 &&
    typeof item.title === 'string' &&
    typeof item.hint === 'string' &&
    typeof item.found === 'boolean' &&
    isOptional(item.photoData, v => typeof v === 'string' && isBase64(v)) &&
    isOptional(item.foundAt, v => typeof v === 'string' && !Number.isNaN(Date.parse(v))) &&
    isOptional(item.address, v => typeof v === 'string')
  );
}

/** Canonical base64 only: decoding and re-encoding must give the same text */
function isBase64(value: string): boolean {
  return value.length % 4 === 0 && Buffer.from(value, 'base64').toString('base64') === value;
}

function isOptional(value: unknown, check: (v: unknown) => boolean): boolean {
  return value === undefined || check(value);
}
