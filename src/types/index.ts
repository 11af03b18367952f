/**
 * Central export for all shared types
 */

export * from './pain-point';
export * from './extraction-session';
export * from './pipeline';
