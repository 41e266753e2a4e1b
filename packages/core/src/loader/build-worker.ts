/**
 * Worker thread entry for WorkerBuildRunner.
 *
 * Receives a BuildRequest as workerData, posts progress and one result (or
 * one error) back, then exits.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { isBuildRequest, runBuildJob } from './build-job.js';
import type { BuildWorkerMessage } from './build-job.js';

const port = parentPort;
if (!port) {
  throw new Error('build-worker must be started as a worker thread');
}

const post = (message: BuildWorkerMessage): void => {
  port.postMessage(message);
};

const request: unknown = workerData;

if (!isBuildRequest(request)) {
  post({ type: 'error', message: 'Invalid build request' });
} else {
  try {
    runBuildJob(request, post);
  } catch (err) {
    post({ type: 'error', message: err instanceof Error ? err.message : String(err) });
  }
}
