/**
 * Content Processing System
 * Main export file for content processing
 */

export * from './processing.types';
export * from './text.processor';
export * from './html.processor';
export * from './section.builder';
