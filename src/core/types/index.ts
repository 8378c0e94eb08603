/**
 * @fileoverview Central export for shared types
 * @module core/types
 */

export * from './common.types';
export * from './job.types';
