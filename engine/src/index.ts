/**
 * Limit Risk Engine - Index
 * Public API exports
 */

// Types
export * from './types';

// Configuration
export { CONFIG } from './config';

// Math utilities
export * from './math';

// Normalization
export * from './odds';
export * from './time';
export * from './cleaner';

// Aggregation + scoring
export * from './metrics';
export * from './scorer';
export * from './recommendations';
export * from './distributions';

// Main entry
export { analyzeWagers, findMissingColumns } from './pipeline';
