import type { ProgressNotification, ProgressToken } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../logger.js';

/**
 * Receives one tick per finished course. Implementations must not throw; the
 * pipeline calls them sequentially, never concurrently.
 */
export interface ProgressReporter {
  report(completed: number, total: number): void;
}

export const silentProgress: ProgressReporter = {
  report: () => {},
};

/**
 * Turn pipeline ticks into MCP `notifications/progress` messages. Without a
 * progress token from the client nothing is sent.
 */
export function createProgressNotifier(
  progressToken: ProgressToken | undefined,
  send: (notification: ProgressNotification) => Promise<void>
): ProgressReporter {
  if (progressToken === undefined) {
    return silentProgress;
  }

  return {
    report(completed, total) {
      void send({
        method: 'notifications/progress',
        params: {
          progressToken,
          progress: completed,
          total,
          message: `Compiled assignments for ${completed} of ${total} courses`,
        },
      }).catch((error: unknown) => {
        logger.warn({ err: error }, 'Failed to send progress notification');
      });
    },
  };
}

/**
 * Guards the tick contract: completed goes 1, 2, ... total, one step at a time.
 */
export class ProgressTracker implements ProgressReporter {
  private completed = 0;

  constructor(
    private readonly total: number,
    private readonly sink: ProgressReporter = silentProgress
  ) {}

  get state(): { completed: number; total: number } {
    return { completed: this.completed, total: this.total };
  }

  advance(): void {
    this.report(this.completed + 1, this.total);
  }

  report(completed: number, total: number): void {
    if (total !== this.total) {
      throw new Error(`Progress total changed from ${this.total} to ${total}`);
    }
    if (completed !== this.completed + 1 || completed > total) {
      throw new Error(`Progress must advance by one: got ${completed} after ${this.completed} of ${total}`);
    }
    this.completed = completed;
    try {
      this.sink.report(completed, total);
    } catch (error) {
      logger.warn({ err: error }, 'Progress reporter threw; continuing');
    }
  }
}
