/**
 * Build runners: where phases 1 and 2 execute.
 *
 * - WorkerBuildRunner runs the build job on a worker thread, keeping the
 *   caller's event loop free for large listings.
 * - InlineBuildRunner defers the job with setImmediate on the caller's own
 *   thread. Used by tests and for small inputs.
 *
 * Both settle with `{ status: 'cancelled' }` when cancelled before finishing.
 */

import { Worker } from 'node:worker_threads';
import pino from 'pino';
import type { Logger } from 'pino';
import { WorkerBuildError } from '../errors.js';
import type { ProgressObserver } from '../types.js';
import { isBuildWorkerMessage, runBuildJob } from './build-job.js';
import type { BuildJobResult, BuildRequest } from './build-job.js';

/** A build that was cancelled before it finished */
export interface BuildCancelled {
  status: 'cancelled';
}

/** What a started build settles with */
export type BuildTaskResult = BuildJobResult | BuildCancelled;

/** A started build */
export interface BuildTask {
  readonly result: Promise<BuildTaskResult>;

  /** Stop the build; a pending result settles as cancelled */
  cancel(): void;
}

/** Starts builds */
export interface BuildRunner {
  start(request: BuildRequest, onProgress: ProgressObserver): BuildTask;
}

// Workers do not inherit tsx's hooks; from sources the loader entry
// registers them inside the worker first. Built output runs the .js directly.
const WORKER_ENTRY = new URL(
  import.meta.url.endsWith('.ts') ? './build-worker-loader.mjs' : './build-worker.js',
  import.meta.url
);

export class InlineBuildRunner implements BuildRunner {
  start(request: BuildRequest, onProgress: ProgressObserver): BuildTask {
    let settle: ((result: BuildTaskResult) => void) | null = null;
    let handle: ReturnType<typeof setImmediate> | null = null;

    const result = new Promise<BuildTaskResult>((resolve, reject) => {
      settle = resolve;
      handle = setImmediate(() => {
        handle = null;
        try {
          resolve(
            runBuildJob(request, (message) => {
              if (message.type === 'progress') onProgress(message.event);
            })
          );
        } catch (err) {
          reject(err);
        }
      });
    });

    return {
      result,
      cancel: () => {
        if (handle === null) return;
        clearImmediate(handle);
        handle = null;
        settle?.({ status: 'cancelled' });
      },
    };
  }
}

/** Options for WorkerBuildRunner */
export interface WorkerBuildRunnerOptions {
  /** Worker script. Defaults to the bundled build-worker module. */
  entry?: URL;
  logger?: Logger;
}

export class WorkerBuildRunner implements BuildRunner {
  private readonly entry: URL;
  private readonly logger: Logger;

  constructor(options: WorkerBuildRunnerOptions = {}) {
    this.entry = options.entry ?? WORKER_ENTRY;
    this.logger = (options.logger ?? pino({ enabled: false })).child({
      component: 'worker-build-runner',
    });
  }

  start(request: BuildRequest, onProgress: ProgressObserver): BuildTask {
    const worker = new Worker(this.entry, { workerData: request });
    let settled = false;
    let settle: ((result: BuildTaskResult) => void) | null = null;

    const result = new Promise<BuildTaskResult>((resolve, reject) => {
      const finish = (outcome: BuildTaskResult | Error): void => {
        if (settled) return;
        settled = true;
        if (outcome instanceof Error) {
          reject(outcome);
        } else {
          resolve(outcome);
        }
      };
      settle = finish;

      worker.on('message', (message: unknown) => {
        if (settled) return;
        if (!isBuildWorkerMessage(message)) {
          this.logger.warn({ message }, 'Ignoring unrecognised worker message');
          return;
        }

        switch (message.type) {
          case 'progress':
            onProgress(message.event);
            break;
          case 'result':
            finish(message.result);
            break;
          case 'error':
            finish(new WorkerBuildError(message.message));
            break;
        }
      });

      worker.on('error', (err: Error) => {
        finish(new WorkerBuildError(err.message));
      });

      worker.on('exit', (code: number) => {
        this.logger.debug({ code }, 'Build worker exited');
        finish(new WorkerBuildError(`Build worker exited with code ${code} before returning a result`, code));
      });
    });

    return {
      result,
      cancel: () => {
        if (settled) return;
        settle?.({ status: 'cancelled' });
        worker.terminate().catch((err: unknown) => {
          this.logger.warn({ err }, 'Failed to terminate build worker');
        });
      },
    };
  }
}
