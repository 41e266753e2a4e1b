import { describe, it, expect } from 'vitest';
import { InlineBuildRunner, WorkerBuildRunner } from '../loader/runners.js';
import { WorkerBuildError } from '../errors.js';
import type { ProgressEvent } from '../types.js';
import { createMockLogger } from './helpers.js';

function fixture(name: string): URL {
  return new URL(`./fixtures/${name}`, import.meta.url);
}

describe('InlineBuildRunner', () => {
  it('should run the build job off the current tick', async () => {
    const events: ProgressEvent[] = [];
    const task = new InlineBuildRunner().start(
      { lines: ['C:.', '└── a'], strategy: 'recursive', progressStep: 1 },
      (event) => events.push(event)
    );

    expect(events).toEqual([]);
    const result = await task.result;

    expect(result.status).toBe('built');
    expect(events.at(-1)).toEqual({ phase: 'building', done: 2, total: 2 });
  });

  it('should settle as cancelled when cancelled before running', async () => {
    const events: ProgressEvent[] = [];
    const task = new InlineBuildRunner().start({ lines: ['C:.'], strategy: 'stack' }, (event) =>
      events.push(event)
    );
    task.cancel();

    await expect(task.result).resolves.toEqual({ status: 'cancelled' });
    expect(events).toEqual([]);
  });
});

describe('WorkerBuildRunner', () => {
  it('should relay progress and resolve with the posted result', async () => {
    const { logger, warn } = createMockLogger();
    const events: ProgressEvent[] = [];
    const runner = new WorkerBuildRunner({ entry: fixture('result-worker.mjs'), logger });

    const result = await runner.start({ lines: [], strategy: 'stack' }, (event) => events.push(event)).result;

    expect(result).toEqual({ status: 'no-root' });
    expect(events).toEqual([{ phase: 'parsing', done: 1, total: 1 }]);
    expect(warn).toHaveBeenCalledWith({ message: { type: 'unexpected' } }, 'Ignoring unrecognised worker message');
  });

  it('should reject with the message a failing worker posts', async () => {
    const runner = new WorkerBuildRunner({ entry: fixture('error-worker.mjs') });
    const result = runner.start({ lines: [], strategy: 'stack' }, () => undefined).result;

    await expect(result).rejects.toThrow(WorkerBuildError);
    await expect(result).rejects.toThrow('listing too strange');
  });

  it('should reject with the exit code when the worker exits early', async () => {
    const runner = new WorkerBuildRunner({ entry: fixture('exit-worker.mjs') });
    const error = await runner
      .start({ lines: [], strategy: 'stack' }, () => undefined)
      .result.catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WorkerBuildError);
    expect(error instanceof WorkerBuildError ? error.exitCode : undefined).toBe(3);
  });

  it('should settle as cancelled and stop the worker', async () => {
    const runner = new WorkerBuildRunner({ entry: fixture('idle-worker.mjs') });
    const task = runner.start({ lines: [], strategy: 'stack' }, () => undefined);
    task.cancel();

    await expect(task.result).resolves.toEqual({ status: 'cancelled' });
  });
});

describe('WorkerBuildRunner default entry', () => {
  it('should build a listing on a worker thread from the TypeScript sources', async () => {
    const events: ProgressEvent[] = [];
    const runner = new WorkerBuildRunner();

    const result = await runner.start(
      { lines: ['C:.', '├── fileA.txt', '└── dirB', '    └── fileC.txt'], strategy: 'stack', progressStep: 1 },
      (event) => events.push(event)
    ).result;

    expect(result).toEqual({
      status: 'built',
      forest: {
        names: ['C:.', 'fileA.txt', 'dirB', 'fileC.txt'],
        depths: [0, 1, 1, 2],
        parents: [-1, 0, 0, 2],
      },
      stats: { linesScanned: 4, itemCount: 4, skippedLines: 0, rootCount: 1 },
    });
    expect(events.at(-1)).toEqual({ phase: 'building', done: 4, total: 4 });
  }, 30_000);
});
