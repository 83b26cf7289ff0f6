const COMPACT_THRESHOLD = 32;

/**
 * FIFO frontier for breadth-first discovery. A URL can be pending at most once
 * and is never re-enqueued after it has been visited or has failed.
 */
export class DiscoveryFrontier {
  private queue: string[] = [];
  private head = 0;
  private readonly queued = new Set<string>();
  private readonly visited = new Set<string>();
  private readonly failed = new Set<string>();

  constructor(initialUrl: string) {
    this.enqueueIfNew(initialUrl);
  }

  enqueueIfNew(url: string): boolean {
    if (this.visited.has(url) || this.queued.has(url) || this.failed.has(url)) {
      return false;
    }

    this.queued.add(url);
    this.queue.push(url);
    return true;
  }

  dequeue(): string | undefined {
    if (this.head >= this.queue.length) {
      return undefined;
    }

    const next = this.queue[this.head];
    this.head += 1;
    this.queued.delete(next);

    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }

    return next;
  }

  markVisited(url: string): void {
    this.visited.add(url);
  }

  markFailed(url: string): void {
    this.failed.add(url);
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }

  get pending(): number {
    return this.queue.length - this.head;
  }

  get visitedCount(): number {
    return this.visited.size;
  }
}
