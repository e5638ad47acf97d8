import { DeadlineError, DeadlineErrorKind, RunInProgressError } from '../errors.js';
import { logger } from '../logger.js';
import { CanvasRequester, DeadlineReport } from '../types.js';
import { runDeadlinePipeline } from './pipeline.js';

/**
 * Whatever shows the results: a tool response, a terminal, a window.
 */
export interface DeadlinePresenter {
  displayProgress(completed: number, total: number): void;
  displayResult(report: DeadlineReport): void;
  displayError(kind: DeadlineErrorKind | 'unknown', message: string): void;
}

export type RunStatus = 'idle' | 'running' | 'succeeded' | 'failed';

export type RunOutcome =
  | { status: 'succeeded'; report: DeadlineReport }
  | { status: 'failed'; kind: DeadlineErrorKind | 'unknown'; message: string };

export interface RunnerOptions {
  timezone: string;
  pageSize?: number;
  clock?: () => Date;
}

/**
 * Runs the deadline pipeline one run at a time and routes progress, results and
 * failures to a presenter. Each run replaces the previous outcome.
 */
export class DeadlineRunner {
  private current: Promise<RunOutcome> | null = null;
  private lastOutcome: RunOutcome | null = null;

  constructor(
    private readonly client: CanvasRequester,
    private readonly options: RunnerOptions
  ) {}

  get status(): RunStatus {
    if (this.current) return 'running';
    return this.lastOutcome?.status ?? 'idle';
  }

  /**
   * The presenter sees progress, then exactly one of displayResult or
   * displayError; the returned outcome carries the same result for callers
   * that only need the final value. By the time either final hook runs,
   * `status` already reflects the outcome and a new run may be started.
   */
  start(presenter: DeadlinePresenter, overrides: { timezone?: string } = {}): Promise<RunOutcome> {
    if (this.current) {
      throw new RunInProgressError();
    }

    const run = this.execute(presenter, overrides.timezone ?? this.options.timezone);
    this.current = run;
    return run;
  }

  private async execute(presenter: DeadlinePresenter, timezone: string): Promise<RunOutcome> {
    let outcome: RunOutcome;
    try {
      const report = await runDeadlinePipeline(this.client, {
        timezone,
        pageSize: this.options.pageSize,
        clock: this.options.clock,
        progress: {
          report: (completed, total) =>
            guard('displayProgress', () => presenter.displayProgress(completed, total)),
        },
      });
      outcome = { status: 'succeeded', report };
    } catch (error: unknown) {
      if (error instanceof DeadlineError) {
        outcome = { status: 'failed', kind: error.kind, message: error.message };
      } else {
        logger.error({ err: error }, 'Deadline run failed unexpectedly');
        outcome = {
          status: 'failed',
          kind: 'unknown',
          message: error instanceof Error ? error.message : String(error),
        };
      }
    }

    this.lastOutcome = outcome;
    this.current = null;
    if (outcome.status === 'succeeded') {
      const { report } = outcome;
      guard('displayResult', () => presenter.displayResult(report));
    } else {
      logger.error(`Deadline run failed (${outcome.kind}): ${outcome.message}`);
      const { kind, message } = outcome;
      guard('displayError', () => presenter.displayError(kind, message));
    }
    return outcome;
  }
}

function guard(hook: keyof DeadlinePresenter, call: () => void): void {
  try {
    call();
  } catch (error) {
    logger.warn({ err: error }, `Presenter ${hook} threw; continuing`);
  }
}
