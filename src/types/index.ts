/**
 * Shared type definitions.
 */

export type * from './logger.js';
