/**
 * Hunt store: owns the ordered record list, its derived stats and its file
 */

import type { HuntItem, RewardTier, SeedEntry } from '../types/hunt.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { createSaveQueue, loadItems, type SaveQueue } from './manager.js';
import { DEFAULT_SEED, seedItems } from './seed.js';

export const DISCOUNT_THRESHOLD = 7;

export type StoreListener = (store: HuntStore) => void;

export interface HuntStoreOptions {
  filePath: string;
  logger?: Logger;
  seed?: readonly SeedEntry[];
  now?: () => Date;
}

export class HuntStore {
  private list: HuntItem[];
  private readonly listeners = new Set<StoreListener>();
  private readonly queue: SaveQueue;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private closed = false;

  private constructor(
    readonly filePath: string,
    items: HuntItem[],
    options: HuntStoreOptions,
  ) {
    this.list = items;
    this.queue = createSaveQueue(filePath);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load the saved list, or seed the defaults and write them when the file
   * is missing or unreadable. Never rejects.
   */
  static async open(options: HuntStoreOptions): Promise<HuntStore> {
    const logger = options.logger ?? silentLogger;

    let items: HuntItem[] | null = null;
    try {
      items = await loadItems(options.filePath);
    } catch (err) {
      logger.warn(`Load error: ${errorMessage(err)} - starting from defaults`);
    }

    if (items) {
      logger.debug(`Loaded ${items.length} items from ${options.filePath}`);
      return new HuntStore(options.filePath, items, options);
    }

    const store = new HuntStore(options.filePath, seedItems(options.seed ?? DEFAULT_SEED), options);
    store.save();
    return store;
  }

  get items(): readonly Readonly<HuntItem>[] {
    return this.list;
  }

  getItem(id: string): Readonly<HuntItem> | undefined {
    return this.list.find(item => item.id === id);
  }

  get totalCount(): number {
    return this.list.length;
  }

  get foundCount(): number {
    return this.list.filter(item => item.found).length;
  }

  get allFound(): boolean {
    return this.foundCount === this.totalCount;
  }

  get hasDiscount(): boolean {
    return this.foundCount >= DISCOUNT_THRESHOLD;
  }

  get rewardTier(): RewardTier {
    if (this.allFound) return 'grand-prize';
    if (this.hasDiscount) return 'discount';
    return 'none';
  }

  /**
   * Photo and address replace whatever the item held, including with nothing.
   * The photo bytes are copied, so later changes to the caller's array do not leak in.
   */
  markFound(id: string, photoData?: Uint8Array, address?: string): void {
    this.update(id, item => {
      const next: HuntItem = {
        id: item.id,
        title: item.title,
        hint: item.hint,
        found: true,
        foundAt: new Date(this.now().getTime()),
      };
      if (photoData !== undefined) next.photoData = photoData.slice();
      if (address !== undefined) next.address = address;
      return next;
    });
  }

  /** Leaves found, foundAt and address as they are */
  removePhoto(id: string): void {
    this.update(id, ({ photoData: _photo, ...rest }) => rest);
  }

  resetAll(): void {
    if (!this.writable('resetAll')) return;
    this.list = this.list.map(({ id, title, hint }) => ({ id, title, hint, found: false }));
    this.commit();
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves when every save issued so far has settled */
  flush(): Promise<void> {
    return this.queue.drain();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.listeners.clear();
    await this.flush();
  }

  private update(id: string, change: (item: HuntItem) => HuntItem): void {
    if (!this.writable('update')) return;
    const index = this.list.findIndex(item => item.id === id);
    if (index === -1) return;

    const next = [...this.list];
    next[index] = change(this.list[index]);
    this.list = next;
    this.commit();
  }

  private writable(operation: string): boolean {
    if (this.closed) {
      this.logger.warn(`Ignoring ${operation} on a closed store`);
      return false;
    }
    return true;
  }

  private commit(): void {
    this.save();
    this.notify();
  }

  private save(): void {
    this.queue.enqueue(this.list).catch(err => {
      this.logger.error(`Save error: ${errorMessage(err)}`);
    });
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(this);
      } catch (err) {
        this.logger.error(`Store listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
