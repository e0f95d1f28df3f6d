/**
 * Specification language exports.
 */

export * from './compiler';
export * from './parser';
export * from './schema';
export * from './validator';
export * from './version';
