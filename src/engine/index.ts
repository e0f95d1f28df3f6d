/**
 * Engine exports.
 */

export * from './actions';
export * from './executor';
export * from './path-list';
export * from './postconditions';
export * from './provisioner';
export * from './step-runner';
export * from './verifier';
