/**
 * Provisioning run domain model.
 *
 * A single application of a compiled plan to a snapshot, producing an
 * ordered execution log of step results.
 */

import { TypedError } from './errors';
import { SnapshotState } from './snapshot';
import { ProvisioningSpec } from './step';

/** Run lifecycle states. */
export enum RunStatus {
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Outcome of applying one step. */
export enum StepResultStatus {
  /** The action ran and its postcondition now holds. */
  Applied = 'applied',
  /** The postcondition already held; nothing was done. */
  Skipped = 'skipped',
  Failed = 'failed',
}

/** Result of a single step application. Immutable once recorded. */
export interface StepResult {
  readonly stepId: string;
  readonly status: StepResultStatus;
  /** Number of action attempts (0 when skipped). */
  readonly attempts: number;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationMs: number;
  /** Snapshot revision after the commit, for applied steps. */
  readonly revision?: number;
  readonly error?: TypedError;
}

/** A recorded provisioning run. */
export interface ProvisioningRun {
  id: string;
  specName: string;
  /** The validated specification the run was compiled from. */
  spec: ProvisioningSpec;
  status: RunStatus;
  planHash: string;
  executionOrder: string[];
  /** Execution log in completion order. */
  results: StepResult[];
  /** Snapshot state when the run ended. */
  snapshot: SnapshotState;
  startedAt: string;
  completedAt?: string;
  error?: TypedError;
}
