/**
 * Types for hunt records and their persisted form
 */

export interface HuntItem {
  id: string;
  title: string;
  hint: string;
  found: boolean;
  photoData?: Uint8Array;
  foundAt?: Date;
  address?: string;
}

/** Shape of one record inside hunt.json */
export interface StoredHuntItem {
  id: string;
  title: string;
  hint: string;
  found: boolean;
  photoData?: string;
  foundAt?: string;
  address?: string;
}

export type RewardTier = 'none' | 'discount' | 'grand-prize';

export interface SeedEntry {
  title: string;
  hint: string;
}
