/**
 * Module Inference
 * Main export file for catalog inference
 */

export * from './inference.types';
export * from './title.utils';
export * from './confidence';
export * from './inference.engine';
