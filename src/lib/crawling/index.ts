/**
 * Crawling System
 * Main export file for multi-page crawling utilities
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './duplicate-detector';
export * from './link-discoverer';
export * from './crawling-queue';
export * from './crawling-statistics';
export * from './crawler';
