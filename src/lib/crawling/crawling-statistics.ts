/**
 * Crawling Statistics Tracker
 * Track crawl counters for the extraction report
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesVisited: number = 0;
  private pagesSkipped: number = 0;
  private pagesFailed: number = 0;
  private cacheHits: number = 0;
  private linksDiscovered: number = 0;
  private duplicatesDetected: number = 0;
  private outOfScopeLinks: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor() {
    this.startTime = Date.now();
  }

  recordPageVisit(depth: number, time: number, fromCache: boolean): void {
    this.pagesVisited++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
    if (fromCache) {
      this.cacheHits++;
    }
  }

  recordSkipped(): void {
    this.pagesSkipped++;
  }

  recordFailed(): void {
    this.pagesFailed++;
  }

  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  recordDuplicate(): void {
    this.duplicatesDetected++;
  }

  recordOutOfScope(count: number): void {
    this.outOfScopeLinks += count;
  }

  getStatistics(): CrawlingStatistics {
    const totalTime = Date.now() - this.startTime;
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const totalAttempts = this.pagesVisited + this.pagesFailed;
    const successRate = totalAttempts > 0 ? this.pagesVisited / totalAttempts : 0;

    return {
      pagesVisited: this.pagesVisited,
      pagesSkipped: this.pagesSkipped,
      pagesFailed: this.pagesFailed,
      cacheHits: this.cacheHits,
      linksDiscovered: this.linksDiscovered,
      duplicatesDetected: this.duplicatesDetected,
      outOfScopeLinks: this.outOfScopeLinks,
      depthReached: this.maxDepthReached,
      totalTime,
      averagePageTime,
      successRate,
    };
  }
}
