import { describe, expect, it } from 'vitest';

import { DiscoveryFrontier } from '../src/crawler/state/queue.js';

describe('DiscoveryFrontier', () => {
  it('starts with the initial URL pending', () => {
    const frontier = new DiscoveryFrontier('https://example.com');

    expect(frontier.pending).toBe(1);
    expect(frontier.dequeue()).toBe('https://example.com');
    expect(frontier.dequeue()).toBeUndefined();
  });

  it('dequeues in FIFO order and refuses URLs that are already queued', () => {
    const frontier = new DiscoveryFrontier('https://example.com');

    expect(frontier.enqueueIfNew('https://example.com/a')).toBe(true);
    expect(frontier.enqueueIfNew('https://example.com/b')).toBe(true);
    expect(frontier.enqueueIfNew('https://example.com/a')).toBe(false);
    expect(frontier.pending).toBe(3);

    expect([frontier.dequeue(), frontier.dequeue(), frontier.dequeue()]).toEqual([
      'https://example.com',
      'https://example.com/a',
      'https://example.com/b',
    ]);
  });

  it('refuses visited and failed URLs once they have left the queue', () => {
    const frontier = new DiscoveryFrontier('https://example.com');
    frontier.enqueueIfNew('https://example.com/broken');

    frontier.markVisited(frontier.dequeue() ?? '');
    frontier.markFailed(frontier.dequeue() ?? '');

    expect(frontier.enqueueIfNew('https://example.com')).toBe(false);
    expect(frontier.enqueueIfNew('https://example.com/broken')).toBe(false);
    expect(frontier.hasVisited('https://example.com')).toBe(true);
    expect(frontier.visitedCount).toBe(1);
  });

  it('keeps order across internal compaction', () => {
    const frontier = new DiscoveryFrontier('u0');
    for (let i = 1; i < 100; i += 1) {
      frontier.enqueueIfNew(`u${i}`);
    }

    const drained: string[] = [];
    for (let next = frontier.dequeue(); next !== undefined; next = frontier.dequeue()) {
      drained.push(next);
    }

    expect(drained).toHaveLength(100);
    expect(drained[0]).toBe('u0');
    expect(drained[64]).toBe('u64');
    expect(drained[99]).toBe('u99');
  });
});
