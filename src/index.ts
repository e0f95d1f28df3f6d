/**
 * Strata: declarative, idempotent environment provisioning.
 *
 * Library entry point. The `strata` command lives in ./cli/bin.
 */

export { createApp, createAppContext, ENGINE_VERSION } from './server';
export type { AppContext } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './storage';
export * from './adapters';
export { runCli } from './cli';
