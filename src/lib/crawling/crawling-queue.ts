/**
 * Crawling Queue
 * Breadth-first frontier with depth tracking
 */

import { CrawlTask } from './crawling.types';

export class CrawlingQueue {
  private queue: CrawlTask[] = [];
  private head = 0;

  /**
   * Add task to the back of the queue (BFS order)
   */
  enqueue(task: CrawlTask): void {
    this.queue.push(task);
  }

  /**
   * Take the oldest task (FIFO)
   */
  dequeue(): CrawlTask | null {
    if (this.isEmpty()) {
      return null;
    }

    const task = this.queue[this.head++];

    // Compact once the consumed prefix dominates the backing array
    if (this.head > 1024 && this.head > this.queue.length / 2) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }

    return task;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  size(): number {
    return this.queue.length - this.head;
  }
}
