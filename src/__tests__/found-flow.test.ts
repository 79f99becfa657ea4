import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { HuntStore } from '../state/store.js';
import { LocationTracker } from '../location/tracker.js';
import { markItemFound, parseCoordinate } from '../cli/found.js';
import type { ReverseGeocoder } from '../types/location.js';

describe('markItemFound', () => {
  let dir: string;
  let store: HuntStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'hunt-found-'));
    store = await HuntStore.open({ filePath: join(dir, 'hunt.json') });
  });

  afterEach(async () => {
    await store.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('requires a photo for an item not yet found', async () => {
    const outcome = await markItemFound(store, store.items[0].id, { address: 'Somewhere' });
    expect(outcome).toEqual({ ok: false, reason: 'photo-required' });
    expect(store.foundCount).toBe(0);
  });

  it('reports unknown items', async () => {
    const outcome = await markItemFound(store, 'missing', { photoData: new Uint8Array([1]) });
    expect(outcome).toEqual({ ok: false, reason: 'unknown-item' });
  });

  it('keeps the current photo when re-marking a found item', async () => {
    const id = store.items[1].id;
    await markItemFound(store, id, { photoData: new Uint8Array([1, 2]) });

    const outcome = await markItemFound(store, id, { address: 'Main Street' });

    expect(outcome.ok).toBe(true);
    expect(store.getItem(id)?.photoData).toEqual(new Uint8Array([1, 2]));
    expect(store.getItem(id)?.address).toBe('Main Street');
  });

  it('captures an address from coordinates', async () => {
    const geocoder: ReverseGeocoder = {
      reverseGeocode: vi.fn().mockResolvedValue({ houseNumber: '5', street: 'Museum Way' }),
    };
    const tracker = new LocationTracker(geocoder);
    const id = store.items[3].id;

    const outcome = await markItemFound(
      store,
      id,
      { photoData: new Uint8Array([3]), coordinate: { latitude: 10, longitude: 20 } },
      tracker,
    );

    expect(outcome.ok && outcome.item.address).toBe('5 Museum Way');
    expect(geocoder.reverseGeocode).toHaveBeenCalledWith({ latitude: 10, longitude: 20 }, undefined);
  });

  it('marks the item without an address when the lookup fails', async () => {
    const geocoder: ReverseGeocoder = {
      reverseGeocode: vi.fn().mockRejectedValue(new Error('offline')),
    };
    const tracker = new LocationTracker(geocoder);
    const id = store.items[3].id;

    const outcome = await markItemFound(
      store,
      id,
      { photoData: new Uint8Array([3]), coordinate: { latitude: 10, longitude: 20 } },
      tracker,
    );

    expect(outcome.ok).toBe(true);
    expect(store.getItem(id)?.found).toBe(true);
    expect(store.getItem(id)?.address).toBeUndefined();
  });

  it('forwards the abort signal to the lookup', async () => {
    const geocoder: ReverseGeocoder = {
      reverseGeocode: vi.fn().mockResolvedValue({ street: 'Station Rd' }),
    };
    const tracker = new LocationTracker(geocoder);
    const signal = new AbortController().signal;

    await markItemFound(
      store,
      store.items[9].id,
      { photoData: new Uint8Array([1]), coordinate: { latitude: 3, longitude: 4 }, signal },
      tracker,
    );

    expect(geocoder.reverseGeocode).toHaveBeenCalledWith({ latitude: 3, longitude: 4 }, signal);
  });

  it('prefers an explicit address over a lookup', async () => {
    const geocoder: ReverseGeocoder = { reverseGeocode: vi.fn() };
    const tracker = new LocationTracker(geocoder);

    await markItemFound(
      store,
      store.items[0].id,
      { photoData: new Uint8Array([1]), address: 'Typed In', coordinate: { latitude: 1, longitude: 1 } },
      tracker,
    );

    expect(geocoder.reverseGeocode).not.toHaveBeenCalled();
    expect(store.items[0].address).toBe('Typed In');
  });
});

describe('parseCoordinate', () => {
  it('parses valid pairs', () => {
    expect(parseCoordinate('40.5', '-73.25')).toEqual({ latitude: 40.5, longitude: -73.25 });
  });

  it('rejects missing, non-numeric and out-of-range values', () => {
    expect(parseCoordinate('40.5', undefined)).toBeNull();
    expect(parseCoordinate('north', '10')).toBeNull();
    expect(parseCoordinate('91', '10')).toBeNull();
    expect(parseCoordinate('10', '-181')).toBeNull();
  });

  it('rejects blank values instead of reading them as zero', () => {
    expect(parseCoordinate('', '')).toBeNull();
    expect(parseCoordinate('  ', '10')).toBeNull();
    expect(parseCoordinate('10', ' ')).toBeNull();
  });
});
