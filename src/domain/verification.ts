/**
 * Verification report model.
 *
 * Produced fresh on every verification; the snapshot remains the
 * authoritative state.
 */

export enum VerificationDetail {
  Satisfied = 'Satisfied',
  /** No step result exists for the step. */
  NeverAttempted = 'NeverAttempted',
  /** The postcondition held once (applied or skipped) and no longer does. */
  DriftDetected = 'DriftDetected',
  /** The step's last recorded result was a failure. */
  FailedDuringProvisioning = 'FailedDuringProvisioning',
}

export interface VerificationEntry {
  stepId: string;
  /** Human-readable predicate. */
  postcondition: string;
  holds: boolean;
  detail: VerificationDetail;
  /** The observed value of the resource the predicate reads. */
  observed?: string;
}

export interface VerificationReport {
  revision: number;
  passed: boolean;
  generatedAt: string;
  entries: VerificationEntry[];
}
