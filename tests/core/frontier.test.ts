/**
 * Tests for the breadth-first frontier
 */

import { describe, it, expect } from 'vitest';
import { Frontier, type FrontierOptions } from '../../src/core/frontier';
import { FrontierError } from '../../src/utils/errors';

function createFrontier(overrides: Partial<FrontierOptions> = {}): Frontier {
  return new Frontier({
    maxPages: 10,
    ignorePatterns: ['.pdf', '/login'],
    domainScope: 'contains',
    ...overrides,
  });
}

describe('Frontier lifecycle', () => {
  it('starts idle and returns nothing before seeding', () => {
    const frontier = createFrontier();
    expect(frontier.status).toBe('idle');
    expect(frontier.next()).toBeNull();
  });

  it('normalizes the seed and switches to discovering', () => {
    const frontier = createFrontier();
    expect(frontier.seed('http://example.com/?utm=1')).toBe('https://example.com/');
    expect(frontier.status).toBe('discovering');
    expect(frontier.size).toBe(1);
  });

  it('rejects a second seed', () => {
    const frontier = createFrontier();
    frontier.seed('https://example.com');
    expect(() => frontier.seed('https://example.com/other')).toThrow(FrontierError);
  });

  it('becomes exhausted when the queue runs dry', () => {
    const frontier = createFrontier();
    frontier.seed('https://example.com');

    const url = frontier.next();
    expect(url).toBe('https://example.com/');
    if (url) frontier.markDiscovered(url);

    expect(frontier.next()).toBeNull();
    expect(frontier.status).toBe('exhausted');
    expect(frontier.next()).toBeNull();
  });
});

describe('Frontier ordering', () => {
  it('hands out URLs in breadth-first (FIFO) order', () => {
    const frontier = createFrontier();
    frontier.seed('https://example.com');

    const root = frontier.next();
    expect(root).toBe('https://example.com/');
    if (root) frontier.markDiscovered(root);
    frontier.offer(['https://example.com/a', 'https://example.com/b']);

    const a = frontier.next();
    expect(a).toBe('https://example.com/a');
    if (a) frontier.markDiscovered(a);
    frontier.offer(['https://example.com/a/deep']);

    expect(frontier.next()).toBe('https://example.com/b');
  });
});

describe('Frontier offer', () => {
  it('drops already seen, ignored and out-of-scope candidates', () => {
    const frontier = createFrontier();
    frontier.seed('https://example.com');

    const result = frontier.offer([
      'https://example.com/',
      'https://example.com/about',
      'http://example.com/about?x=1',
      'https://example.com/files/brochure.PDF',
      'https://example.com/login',
      'https://other.org/page',
      'https://shop.example.com/cart',
    ]);

    expect(result.enqueued).toEqual(['https://example.com/about', 'https://shop.example.com/cart']);
    expect(result.rejected).toEqual({ seen: 2, ignored: 2, out_of_scope: 1, capacity: 0 });
  });

  it("honours 'exact' scope", () => {
    const frontier = createFrontier({ domainScope: 'exact' });
    frontier.seed('https://example.com');

    const result = frontier.offer(['https://www.example.com/a', 'https://example.com/b']);
    expect(result.enqueued).toEqual(['https://example.com/b']);
    expect(result.rejected.out_of_scope).toBe(1);
  });

  it('stops enqueuing once discovered + queued reaches maxPages', () => {
    const frontier = createFrontier({ maxPages: 3 });
    frontier.seed('https://example.com');

    const result = frontier.offer([
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
    ]);

    expect(result.enqueued).toEqual(['https://example.com/a', 'https://example.com/b']);
    expect(result.rejected.capacity).toBe(1);
  });

  it('does not re-offer a URL that was visited but failed', () => {
    const frontier = createFrontier();
    frontier.seed('https://example.com');

    const url = frontier.next();
    if (url) frontier.markVisited(url);

    expect(frontier.isVisited('http://example.com/')).toBe(true);
    expect(frontier.offer(['https://example.com/']).rejected.seen).toBe(1);
    expect(frontier.discovered).toEqual([]);
  });
});

describe('Frontier capacity', () => {
  it('never discovers more than maxPages URLs', () => {
    const frontier = createFrontier({ maxPages: 2 });
    frontier.seed('https://example.com');

    const visitedOrder: string[] = [];
    for (let url = frontier.next(); url !== null; url = frontier.next()) {
      visitedOrder.push(url);
      frontier.markDiscovered(url);
      frontier.offer([`${url.replace(/\/$/, '')}/x`, `${url.replace(/\/$/, '')}/y`]);
    }

    expect(frontier.discovered).toEqual(['https://example.com/', 'https://example.com/x']);
    expect(visitedOrder).toEqual(['https://example.com/', 'https://example.com/x']);
    expect(frontier.status).toBe('exhausted');
  });

  it('ignores duplicate discoveries', () => {
    const frontier = createFrontier();
    frontier.seed('https://example.com');
    frontier.markDiscovered('https://example.com/');
    frontier.markDiscovered('https://example.com/');
    expect(frontier.discovered).toEqual(['https://example.com/']);
  });
});
