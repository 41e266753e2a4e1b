import { describe, it, expect, vi } from 'vitest';
import { TreeLoader } from '../loader/tree-loader.js';
import { InlineBuildRunner } from '../loader/runners.js';
import type { BuildRunner } from '../loader/runners.js';
import type { ProgressEvent } from '../types.js';
import { createMockLogger } from './helpers.js';

const LISTING = ['C:.', '├── fileA.txt', '└── dirB', '    └── fileC.txt'];

function makeLoader(overrides: { runner?: BuildRunner; progressStep?: number } = {}): TreeLoader {
  return new TreeLoader({
    runner: overrides.runner ?? new InlineBuildRunner(),
    progressStep: overrides.progressStep,
    logger: createMockLogger().logger,
  });
}

describe('TreeLoader', () => {
  it('should load a listing and expose its roots', async () => {
    const loader = makeLoader();
    const loaded = vi.fn();
    loader.on('loaded', loaded);

    const result = await loader.load(LISTING);

    expect(result.status).toBe('loaded');
    if (result.status !== 'loaded') return;
    expect(result.generation).toBe(1);
    expect(result.materializer.roots().map((handle) => handle.node.name)).toEqual(['C:.']);
    expect(result.stats).toEqual({ linesScanned: 4, itemCount: 4, skippedLines: 0, rootCount: 1 });
    expect(loader.current).toBe(result);
    expect(loaded).toHaveBeenCalledWith(result);
  });

  it('should report no-root for an empty listing', async () => {
    const loader = makeLoader();
    const noRoot = vi.fn();
    loader.on('noRoot', noRoot);

    await expect(loader.load([])).resolves.toEqual({ status: 'no-root', generation: 1 });
    expect(noRoot).toHaveBeenCalledWith(1);
    expect(loader.current).toBeNull();
  });

  it('should emit progress for all three phases in order', async () => {
    const loader = makeLoader({ progressStep: 1 });
    const events: ProgressEvent[] = [];
    loader.on('progress', (event) => events.push(event));

    await loader.load(['C:.', '└── a']);

    expect(events).toEqual([
      { phase: 'parsing', done: 1, total: 2 },
      { phase: 'parsing', done: 2, total: 2 },
      { phase: 'building', done: 1, total: 2 },
      { phase: 'building', done: 2, total: 2 },
      { phase: 'populating', done: 1, total: 1 },
    ]);
  });

  it('should drop the result of a superseded load', async () => {
    const loader = makeLoader();
    const superseded = vi.fn();
    loader.on('superseded', superseded);

    const first = loader.load(['OLD:', '└── stale']);
    const second = loader.load(LISTING);

    await expect(first).resolves.toEqual({ status: 'superseded', generation: 1 });
    const result = await second;
    expect(result.status).toBe('loaded');
    expect(superseded).toHaveBeenCalledWith(1);
    expect(loader.current?.forest[0]?.name).toBe('C:.');
  });

  it('should never apply a cancelled load', async () => {
    const loader = makeLoader();

    const pending = loader.load(LISTING);
    expect(loader.isLoading).toBe(true);
    loader.cancel();

    await expect(pending).resolves.toEqual({ status: 'superseded', generation: 1 });
    expect(loader.current).toBeNull();
    expect(loader.isLoading).toBe(false);
    expect(loader.currentGeneration).toBe(2);
  });

  it('should keep the previous tree when a later listing has no root', async () => {
    const loader = makeLoader();
    const first = await loader.load(LISTING);
    await loader.load(['Folder PATH listing for volume C']);

    expect(loader.current).toBe(first);
  });

  it('should emit failed and rethrow when the build fails', async () => {
    const runner: BuildRunner = {
      start: () => ({ result: Promise.reject(new Error('worker crashed')), cancel: vi.fn() }),
    };
    const loader = makeLoader({ runner });
    const failed = vi.fn();
    loader.on('failed', failed);

    await expect(loader.load(LISTING)).rejects.toThrow('worker crashed');
    expect(failed).toHaveBeenCalledWith(expect.objectContaining({ message: 'worker crashed' }), 1);
    expect(loader.isLoading).toBe(false);
  });
});
