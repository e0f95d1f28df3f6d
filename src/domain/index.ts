/**
 * Domain model exports.
 */

export * from './errors';
export * from './run';
export * from './snapshot';
export * from './step';
export * from './verification';
