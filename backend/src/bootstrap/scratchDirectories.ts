import { mkdirSync } from 'fs';
import { join } from 'path';
import { BootstrapError } from '../runtime/errors.js';

export interface ScratchPaths {
  uploads: string;
  cachedChunks: string;
}

export function scratchPaths(root: string): ScratchPaths {
  return {
    uploads: join(root, 'uploads'),
    cachedChunks: join(root, 'cached_chunks'),
  };
}

/**
 * Create the writable directories services expect. Must run before
 * `initializeServices`. Safe to call again when they already exist.
 */
export function ensureScratchDirectories(root: string): ScratchPaths {
  const paths = scratchPaths(root);

  for (const dir of [paths.uploads, paths.cachedChunks]) {
    try {
      mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new BootstrapError(`Could not create scratch directory ${dir}`, { cause: error });
    }
  }

  return paths;
}
