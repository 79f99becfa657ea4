/**
 * "Mark as found" flow shared by the CLI: photo precondition, address capture
 */

import type { HuntItem } from '../types/hunt.js';
import type { Coordinate } from '../types/location.js';
import type { HuntStore } from '../state/store.js';
import type { LocationTracker } from '../location/tracker.js';

export interface FoundRequest {
  photoData?: Uint8Array;
  address?: string;
  coordinate?: Coordinate;
  /** Bounds the address lookup */
  signal?: AbortSignal;
}

export type FoundOutcome =
  | { ok: true; item: Readonly<HuntItem> }
  | { ok: false; reason: 'photo-required' | 'unknown-item' };

/**
 * An unfound item needs a photo; an item already found keeps its current
 * photo when none is given. An explicit address wins over a resolved one.
 */
export async function markItemFound(
  store: HuntStore,
  itemId: string,
  request: FoundRequest,
  tracker?: LocationTracker,
): Promise<FoundOutcome> {
  const current = store.getItem(itemId);
  if (!current) return { ok: false, reason: 'unknown-item' };

  if (!current.found && !request.photoData) {
    return { ok: false, reason: 'photo-required' };
  }

  let address = request.address;
  if (address === undefined && request.coordinate && tracker) {
    tracker.captureAddress(request.coordinate, { signal: request.signal });
    await tracker.idle();
    address = tracker.lastAddress ?? undefined;
  }

  store.markFound(itemId, request.photoData ?? current.photoData, address);

  const updated = store.getItem(itemId);
  return updated ? { ok: true, item: updated } : { ok: false, reason: 'unknown-item' };
}

export function parseCoordinate(lat: string | undefined, lon: string | undefined): Coordinate | null {
  if (lat === undefined || lon === undefined) return null;
  if (!lat.trim() || !lon.trim()) return null;
  const latitude = Number(lat);
  const longitude = Number(lon);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;
  return { latitude, longitude };
}
