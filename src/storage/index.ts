/**
 * Storage exports.
 */

export * from './memory-store';
export * from './snapshot-file';
export * from './store';
