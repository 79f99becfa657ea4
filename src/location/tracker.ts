/**
 * Holds the most recent device location and its resolved address.
 * Resolution runs in the background; callers poll the fields or subscribe.
 */

import type { Coordinate, ReverseGeocoder } from '../types/location.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { formatAddress } from './geocoder.js';

export type TrackerListener = (tracker: LocationTracker) => void;

export interface CaptureOptions {
  /** Aborts the geocoder request, e.g. AbortSignal.timeout(ms) */
  signal?: AbortSignal;
}

export class LocationTracker {
  private location: Coordinate | null = null;
  private address: string | null = null;
  private readonly pending = new Set<Promise<void>>();
  private readonly listeners = new Set<TrackerListener>();

  constructor(
    private readonly geocoder: ReverseGeocoder,
    private readonly logger: Logger = silentLogger,
  ) {}

  get lastLocation(): Coordinate | null {
    return this.location;
  }

  get lastAddress(): string | null {
    return this.address;
  }

  get resolving(): boolean {
    return this.pending.size > 0;
  }

  /**
   * Start resolving an address for the coordinate without waiting for it.
   * When requests overlap, whichever completes last sets lastAddress.
   */
  captureAddress(coordinate: Coordinate, options: CaptureOptions = {}): void {
    this.location = coordinate;
    this.notify();

    const task = this.resolve(coordinate, options.signal).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  /** Resolves once no lookup is outstanding */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  subscribe(listener: TrackerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async resolve(coordinate: Coordinate, signal?: AbortSignal): Promise<void> {
    try {
      const placemark = await this.geocoder.reverseGeocode(coordinate, signal);
      this.address = formatAddress(placemark);
      this.notify();
    } catch (err) {
      this.logger.warn(`Location error: ${errorMessage(err)}`);
    }
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(this);
      } catch (err) {
        this.logger.error(`Location listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
