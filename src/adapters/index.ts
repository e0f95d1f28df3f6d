/**
 * Host and process adapters.
 */

export * from './exec/interface';
export { default as nodeExec } from './exec/node-process';
export * from './host/classify';
export * from './host/interface';
export * from './host/shell-host';
export * from './host/simulated-host';
