/**
 * File persistence for the hunt record list
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { HuntItem } from '../types/hunt.js';
import { HuntFileError, errorMessage, isNotFoundError } from '../errors.js';
import { decodeItems, encodeItems } from './codec.js';

/**
 * Returns null when no file exists yet
 */
export async function loadItems(filePath: string): Promise<HuntItem[] | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFoundError(err)) {
      return null;
    }
    throw new HuntFileError(filePath, 'could not be read', { cause: err });
  }

  try {
    return decodeItems(content);
  } catch (err) {
    throw new HuntFileError(filePath, errorMessage(err), { cause: err });
  }
}

export async function saveItems(filePath: string, items: readonly HuntItem[]): Promise<void> {
  await writeAtomic(filePath, encodeItems(items));
}

async function writeAtomic(filePath: string, content: string): Promise<void> {
  const tempFile = `${filePath}.tmp`;
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(tempFile, content, 'utf-8');
  await fs.rename(tempFile, filePath);
}

export interface SaveQueue {
  /** Snapshot the list now and write it after any earlier save */
  enqueue(items: readonly HuntItem[]): Promise<void>;
  /** Resolves once every save enqueued so far has settled */
  drain(): Promise<void>;
}

export function createSaveQueue(filePath: string): SaveQueue {
  let tail: Promise<void> = Promise.resolve();

  return {
    enqueue(items) {
      const content = encodeItems(items);
      const write = tail.then(() => writeAtomic(filePath, content));
      // Keep the chain alive when a write fails; the caller sees the rejection
      tail = write.catch(() => undefined);
      return write;
    },
    drain() {
      return tail;
    },
  };
}
