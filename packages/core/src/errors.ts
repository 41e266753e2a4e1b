/**
 * Errors thrown on contract violations. Expected conditions such as a
 * listing without a root are returned as outcomes instead.
 */

/** A lookahead sequence was advanced with nothing left. */
export class ExhaustedError extends Error {
  constructor() {
    super('Lookahead sequence exhausted');
    this.name = 'ExhaustedError';
  }
}

/** An item was inserted after the stack builder handed out its forest. */
export class BuilderFinishedError extends Error {
  constructor() {
    super('Forest builder already finished');
    this.name = 'BuilderFinishedError';
  }
}

/** The build worker failed or exited before returning a result. */
export class WorkerBuildError extends Error {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null) {
    super(message);
    this.name = 'WorkerBuildError';
    this.exitCode = exitCode;
  }
}
