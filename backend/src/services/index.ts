import { env } from '../config/env.js';
import { closePool, verifyConnection } from '../config/database.js';
import { scratchPaths } from '../bootstrap/scratchDirectories.js';
import { loadChunkIndex, type ChunkIndex } from './chunkCache.js';

export interface ServiceStatus {
  initialized: boolean;
  cachedChunks: number;
}

let chunkIndex: ChunkIndex | null = null;

/**
 * One-time setup for everything the routes depend on. Expects the scratch
 * directories to exist already.
 */
export async function initializeServices(scratchDir: string = env.SCRATCH_DIR): Promise<void> {
  await verifyConnection();

  const { cachedChunks } = scratchPaths(scratchDir);
  chunkIndex = loadChunkIndex(cachedChunks);
  console.log(`Loaded ${chunkIndex.size} cached chunks from ${cachedChunks}`);
}

export function getServiceStatus(): ServiceStatus {
  return {
    initialized: chunkIndex !== null,
    cachedChunks: chunkIndex?.size ?? 0,
  };
}

export async function shutdownServices(): Promise<void> {
  chunkIndex = null;
  await closePool();
}
