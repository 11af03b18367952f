/**
 * Central export for the pipeline entry points
 */

export * from './session-tracker';
export * from './pain-radar-pipeline';
