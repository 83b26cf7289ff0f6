import pLimit from 'p-limit';

import { componentLogger } from '../../logger.js';
import type { FailureEvent, PageFetchOptions, PageFetcher, PageRecord } from '../../types.js';
import { FailureTracker } from '../state/failures.js';
import { toPageRecord } from '../pageRecord.js';

export interface FetchSchedulerOptions {
  concurrency: number;
  fetchOptions: PageFetchOptions;
  onPage?: (page: PageRecord) => void;
  onFailure?: (event: FailureEvent) => void;
}

export interface ScheduledFetchResult {
  pages: PageRecord[];
  failures: FailureEvent[];
}

type TaskOutcome =
  | { ok: true; page: PageRecord }
  | { ok: false; url: string; error: unknown };

/**
 * Fans a batch of URLs out to the page fetcher with bounded concurrency.
 * Pages come back in completion order; failed URLs are recorded and left out.
 */
export class FetchScheduler {
  private readonly limiter: ReturnType<typeof pLimit>;

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly options: FetchSchedulerOptions,
  ) {
    this.limiter = pLimit(options.concurrency);
  }

  async fetchAll(urls: readonly string[]): Promise<ScheduledFetchResult> {
    const log = componentLogger('fetch-scheduler');
    const failures = new FailureTracker(this.options.onFailure);
    const pages: PageRecord[] = [];

    const tasks = urls.map((url, index) =>
      this.limiter(async (): Promise<TaskOutcome> => {
        log.debug({ url, position: index + 1, total: urls.length }, 'fetching page');
        return this.runTask(url);
      }),
    );

    for await (const outcome of inCompletionOrder(tasks)) {
      if (outcome.ok) {
        pages.push(outcome.page);
        this.options.onPage?.(outcome.page);
      } else {
        failures.record(outcome.url, 'fetch', outcome.error);
      }
    }

    log.info({ requested: urls.length, fetched: pages.length, failed: failures.size }, 'batch complete');
    return { pages, failures: failures.list() };
  }

  private async runTask(url: string): Promise<TaskOutcome> {
    try {
      const result = await this.fetcher.fetch(url, this.options.fetchOptions);
      if (!result.success) {
        return { ok: false, url, error: result.reason };
      }
      return { ok: true, page: toPageRecord(result) };
    } catch (error) {
      return { ok: false, url, error };
    }
  }
}

/**
 * Yields the values of `tasks` as they settle. The tasks must not reject.
 */
export async function* inCompletionOrder<T>(tasks: readonly Promise<T>[]): AsyncGenerator<T> {
  const pending = new Map<number, Promise<{ index: number; value: T }>>();
  tasks.forEach((task, index) => {
    pending.set(index, task.then((value) => ({ index, value })));
  });

  while (pending.size > 0) {
    const { index, value } = await Promise.race(pending.values());
    pending.delete(index);
    yield value;
  }
}
