/**
 * Central export for all processing modules
 */

export * from './sentiment-classifier';
export * from './sentiment-analyzer';
export * from './sentiment-filter';
export * from './pain-point-schema';
export * from './opportunity-score';
export * from './extraction-adapter';
export * from './pain-point-extractor';
