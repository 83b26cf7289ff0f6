import type { FailureEvent, FailureStage } from '../../types.js';
import { reportCrawlerError } from '../../util/errorHandler.js';

export class FailureTracker {
  private readonly log: FailureEvent[] = [];

  constructor(private readonly onFailure?: (event: FailureEvent) => void) {}

  /**
   * Records a recoverable failure for `url`, logs it and notifies the
   * listener. The logged URL is always the one the failing task was given.
   */
  record(url: string, stage: FailureStage, error: unknown): FailureEvent {
    const crawlerError = reportCrawlerError(
      error,
      { stage, url },
      { defaultKind: 'fetch', defaultSeverity: 'recoverable', throwOnFatal: false },
    );

    const event: FailureEvent = { url, stage, reason: crawlerError.message };
    this.log.push(event);
    this.onFailure?.(event);
    return event;
  }

  list(): FailureEvent[] {
    return [...this.log];
  }

  get size(): number {
    return this.log.length;
  }
}
