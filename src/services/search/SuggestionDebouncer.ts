/**
 * Collapses bursts of suggestion requests into the last one
 */

import { createLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';

export const SUGGESTION_DEBOUNCE_MS = 300;

export class SuggestionDebouncer<T> {
  private logger = createLogger('SuggestionDebouncer');
  private timer: NodeJS.Timeout | null = null;
  private pending: ((value: T[]) => void) | null = null;

  constructor(private readonly delayMs = SUGGESTION_DEBOUNCE_MS) {}

  /**
   * Runs the task after the delay unless another call arrives first.
   * Superseded calls resolve to an empty list.
   */
  run(task: () => Promise<T[]>): Promise<T[]> {
    this.cancel();

    return new Promise<T[]>((resolve) => {
      this.pending = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.pending = null;
        task().then(resolve, (error: unknown) => {
          this.logger.warn('Debounced suggestion task failed', {
            error: errorMessage(error),
          });
          resolve([]);
        });
      }, this.delayMs);
    });
  }

  /**
   * Drops the pending call, resolving it with an empty list
   */
  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending) {
      this.pending([]);
      this.pending = null;
    }
  }
}
