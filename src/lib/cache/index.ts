/**
 * Fetch Cache System
 * Main export file for the persistent fetch cache
 */

export * from './cache.types';
export * from './cache.strategies';
export * from './cache.manager';
