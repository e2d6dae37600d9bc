import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ensureScratchDirectories, scratchPaths } from '../bootstrap/scratchDirectories.js';
import { BootstrapError } from '../runtime/errors.js';

describe('ensureScratchDirectories', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'scratch-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('creates the uploads and cached chunks directories', () => {
    const paths = ensureScratchDirectories(root);

    expect(paths).toEqual({
      uploads: join(root, 'uploads'),
      cachedChunks: join(root, 'cached_chunks'),
    });
    expect(statSync(paths.uploads).isDirectory()).toBe(true);
    expect(statSync(paths.cachedChunks).isDirectory()).toBe(true);
  });

  it('can run again when the directories already exist', () => {
    ensureScratchDirectories(root);
    writeFileSync(join(root, 'cached_chunks', 'chunk-1.json'), '{}');

    ensureScratchDirectories(root);

    expect(existsSync(join(root, 'cached_chunks', 'chunk-1.json'))).toBe(true);
  });

  it('creates a missing root', () => {
    const nested = join(root, 'a', 'b');

    ensureScratchDirectories(nested);

    expect(statSync(scratchPaths(nested).uploads).isDirectory()).toBe(true);
  });

  it('raises a BootstrapError when a directory cannot be created', () => {
    // A file where the root directory should be
    const blocked = join(root, 'blocked');
    writeFileSync(blocked, '');

    expect(() => ensureScratchDirectories(blocked)).toThrow(BootstrapError);
    expect(() => ensureScratchDirectories(blocked)).toThrow(
      `Could not create scratch directory ${join(blocked, 'uploads')}`
    );
  });
});
