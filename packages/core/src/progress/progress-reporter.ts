/**
 * ProgressReporter - throttled, best-effort progress feed for one phase.
 *
 * Emits at most once per `step` items so a fast producer is never slowed by
 * its observer, and reports `done === total` exactly once on completion.
 * Reported `done` values strictly increase. A missing observer is fine; an
 * observer that throws is logged and the pipeline carries on.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { DEFAULT_PROGRESS_UPDATES } from '../constants.js';
import type { ProgressObserver, ProgressPhase } from '../types.js';

/** Options for a ProgressReporter */
export interface ProgressReporterOptions {
  /** Minimum items between reports. Default: 1% of total (at least 1). */
  step?: number;

  /** Logger for observer failures. Defaults to a disabled logger. */
  logger?: Logger;
}

/**
 * Default reporting step for a phase of `total` items.
 */
export function defaultProgressStep(total: number): number {
  return Math.max(1, Math.floor(total / DEFAULT_PROGRESS_UPDATES));
}

export class ProgressReporter {
  readonly phase: ProgressPhase;
  readonly total: number;
  private readonly step: number;
  private readonly observer: ProgressObserver | undefined;
  private readonly logger: Logger;
  private lastReported = 0;
  private completed = false;

  constructor(
    phase: ProgressPhase,
    total: number,
    observer?: ProgressObserver,
    options: ProgressReporterOptions = {}
  ) {
    this.phase = phase;
    this.total = Math.max(0, total);
    this.step = Math.max(1, options.step ?? defaultProgressStep(this.total));
    this.observer = observer;
    this.logger = (options.logger ?? pino({ enabled: false })).child({
      component: 'progress-reporter',
    });
  }

  /** Whether the final report has been sent */
  get isComplete(): boolean {
    return this.completed;
  }

  /**
   * Record that `done` items are finished. Reports only when at least `step`
   * items passed since the last report; the final count is left to complete().
   */
  update(done: number): void {
    if (this.completed || done >= this.total) {
      return;
    }
    if (done - this.lastReported < this.step) {
      return;
    }
    this.emit(done);
  }

  /**
   * Send the final `done === total` report. Later calls are ignored.
   */
  complete(): void {
    if (this.completed) {
      return;
    }
    this.completed = true;
    this.emit(this.total);
  }

  private emit(done: number): void {
    this.lastReported = done;
    if (!this.observer) {
      return;
    }

    try {
      this.observer({ phase: this.phase, done, total: this.total });
    } catch (err) {
      this.logger.warn({ err, phase: this.phase, done }, 'Progress observer failed');
    }
  }
}
