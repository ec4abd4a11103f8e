/**
 * Crawling Queue Tests
 */

import { CrawlingQueue } from '../crawling-queue';
import { DuplicateDetector } from '../duplicate-detector';

const ROOT = 'https://docs.example.com';

const task = (path: string, depth: number) => ({
  url: `${ROOT}${path}`,
  fetchUrl: `${ROOT}${path}/`,
  depth,
  rootUrl: ROOT,
});

describe('CrawlingQueue', () => {
  let queue: CrawlingQueue;

  beforeEach(() => {
    queue = new CrawlingQueue();
  });

  it('should dequeue in insertion order', () => {
    queue.enqueue(task('/a', 0));
    queue.enqueue(task('/b', 1));
    queue.enqueue(task('/c', 1));

    expect(queue.dequeue()).toEqual(task('/a', 0));
    expect(queue.dequeue()?.url).toBe(`${ROOT}/b`);
    expect(queue.dequeue()?.url).toBe(`${ROOT}/c`);
    expect(queue.dequeue()).toBeNull();
    expect(queue.isEmpty()).toBe(true);
  });

  it('should keep order across compaction', () => {
    for (let i = 0; i < 3000; i++) {
      queue.enqueue(task(`/p${i}`, 1));
    }
    for (let i = 0; i < 2000; i++) {
      queue.dequeue();
    }

    expect(queue.size()).toBe(1000);
    expect(queue.dequeue()?.url).toBe(`${ROOT}/p2000`);
    expect(queue.size()).toBe(999);
  });
});

describe('DuplicateDetector', () => {
  it('should treat normalized variants as the same URL', () => {
    const detector = new DuplicateDetector();

    expect(detector.addUrl('https://docs.example.com/guide/')).toBe(false);
    expect(detector.addUrl('https://DOCS.example.com/guide#setup')).toBe(true);
    expect(detector.addUrl('https://docs.example.com/setup')).toBe(false);
  });

  it('should reject URLs that cannot be normalized', () => {
    const detector = new DuplicateDetector();

    expect(detector.addUrl('mailto:team@example.com')).toBe(true);
    expect(detector.addUrl('not a url')).toBe(true);
  });
});
