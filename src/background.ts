/**
 * Detached background work.
 *
 * Tasks start on a later macrotask, so whatever scheduled them has already
 * returned. A task's failure is logged and never reaches the scheduler.
 */

import { toError } from './errors';
import { createLogger, type Logger } from './logger';

export class BackgroundQueue {
  private pending = new Set<Promise<void>>();
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger('background');
  }

  /** Schedule `task`; the caller gets no handle to it */
  schedule(name: string, task: () => Promise<unknown>): void {
    const run = new Promise<void>((resolve) => {
      setImmediate(() => {
        this.logger.debug(`Starting ${name}`);
        task()
          .then(() => this.logger.debug(`Finished ${name}`))
          .catch((err: unknown) => this.logger.error(`Background task ${name} failed`, { error: toError(err) }))
          .finally(() => {
            this.pending.delete(run);
            resolve();
          });
      });
    });
    this.pending.add(run);
  }

  /** Number of scheduled tasks not yet settled */
  get size(): number {
    return this.pending.size;
  }

  /** Wait until every scheduled task, including ones scheduled meanwhile, has settled */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
