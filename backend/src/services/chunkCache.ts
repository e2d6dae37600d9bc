import { readdirSync } from 'fs';
import { basename, join } from 'path';

/** Previously computed chunk files, keyed by chunk id (file name without `.json`). */
export type ChunkIndex = Map<string, string>;

export function loadChunkIndex(dir: string): ChunkIndex {
  const index: ChunkIndex = new Map();

  for (const file of readdirSync(dir)) {
    if (!file.endsWith('.json')) continue;
    index.set(basename(file, '.json'), join(dir, file));
  }

  return index;
}
