/**
 * Verifier: re-evaluates every postcondition against a snapshot.
 *
 * Read-only: the snapshot is never mutated and the report is produced fresh
 * on each call. The execution log distinguishes drift (the postcondition held
 * once) from steps that never ran or failed.
 */

import path from 'path';
import { StepResult, StepResultStatus } from '../domain/run';
import { Snapshot } from '../domain/snapshot';
import { Step } from '../domain/step';
import { VerificationDetail, VerificationEntry, VerificationReport } from '../domain/verification';
import { evaluatePostcondition } from './postconditions';

export interface VerifyOptions {
  /** Separator for path-list variables; defaults to the platform's. */
  pathSeparator?: string;
}

export function verify(
  steps: Step[],
  snapshot: Snapshot,
  log: StepResult[] = [],
  options: VerifyOptions = {},
): VerificationReport {
  const separator = options.pathSeparator ?? path.delimiter;
  const lastResult = new Map<string, StepResult>();
  for (const result of log) {
    lastResult.set(result.stepId, result);
  }

  const entries = steps.map((step): VerificationEntry => {
    const result = evaluatePostcondition(step, snapshot, separator);
    return {
      stepId: step.id,
      postcondition: result.description,
      holds: result.holds,
      detail: result.holds ? VerificationDetail.Satisfied : failureDetail(lastResult.get(step.id)),
      ...(result.observed !== undefined ? { observed: result.observed } : {}),
    };
  });

  return {
    revision: snapshot.revision,
    passed: entries.every((e) => e.holds),
    generatedAt: new Date().toISOString(),
    entries,
  };
}

function failureDetail(last: StepResult | undefined): VerificationDetail {
  if (!last) return VerificationDetail.NeverAttempted;
  return last.status === StepResultStatus.Failed
    ? VerificationDetail.FailedDuringProvisioning
    : VerificationDetail.DriftDetected;
}
