import type { UsageEntry, UsageStats } from '../../types.js';

export function emptyUsage(): UsageStats {
  return { completionTokens: 0, promptTokens: 0, totalTokens: 0 };
}

/** Running token totals for one crawl plus the per-request history. */
export class UsageTracker {
  private readonly totals = emptyUsage();
  private readonly history: UsageEntry[] = [];

  record(usage: UsageStats): UsageEntry {
    const entry: UsageEntry = {
      request: this.history.length + 1,
      completionTokens: nonNegative(usage.completionTokens),
      promptTokens: nonNegative(usage.promptTokens),
      totalTokens: nonNegative(usage.totalTokens),
    };

    this.totals.completionTokens += entry.completionTokens;
    this.totals.promptTokens += entry.promptTokens;
    this.totals.totalTokens += entry.totalTokens;
    this.history.push(entry);
    return entry;
  }

  summary(): UsageStats {
    return { ...this.totals };
  }

  entries(): UsageEntry[] {
    return this.history.map((entry) => ({ ...entry }));
  }
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;
}
