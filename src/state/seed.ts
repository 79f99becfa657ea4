/**
 * Default hunt locations used on first run
 */

import { randomUUID } from 'crypto';
import type { HuntItem, SeedEntry } from '../types/hunt.js';

export const DEFAULT_SEED: readonly SeedEntry[] = [
  { title: 'City Bookstore', hint: 'Find the aisle with local authors.' },
  { title: 'Main Street Café', hint: 'Smells like fresh croissants at 8am.' },
  { title: 'Riverside Park', hint: 'Near the big fountain.' },
  { title: 'Museum Lobby', hint: 'Stand by the dinosaur.' },
  { title: 'Cinema Lobby', hint: 'Poster wall of classic films.' },
  { title: 'City Hall', hint: 'Look for the statue out front.' },
  { title: 'Ice Cream Shop', hint: 'Blue bench by the door.' },
  { title: 'Tech Hub', hint: 'Cowork space on 2nd floor.' },
  { title: 'Art Gallery', hint: 'Red abstract piece in entry.' },
  { title: 'Train Station', hint: 'Platform 2 timetable.' },
];

export interface NewHuntItem {
  title: string;
  hint: string;
  id?: string;
  found?: boolean;
  photoData?: Uint8Array;
  foundAt?: Date;
  address?: string;
}

export function createHuntItem(init: NewHuntItem): HuntItem {
  const item: HuntItem = {
    id: init.id ?? randomUUID(),
    title: init.title,
    hint: init.hint,
    found: init.found ?? false,
  };
  if (init.photoData !== undefined) item.photoData = init.photoData;
  if (init.foundAt !== undefined) item.foundAt = init.foundAt;
  if (init.address !== undefined) item.address = init.address;
  return item;
}

export function sameItem(a: Pick<HuntItem, 'id'>, b: Pick<HuntItem, 'id'>): boolean {
  return a.id === b.id;
}

export function seedItems(seed: readonly SeedEntry[] = DEFAULT_SEED): HuntItem[] {
  return seed.map(entry => createHuntItem(entry));
}
