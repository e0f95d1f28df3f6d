/**
 * Postcondition predicates.
 *
 * Each action kind maps to a pure predicate over the snapshot. Every step
 * writes exactly one resource key; the predicate reads that key.
 */

import { ActionKind, Step } from '../domain/step';
import { Snapshot } from '../domain/snapshot';
import { segmentSatisfied } from './path-list';

/** Value recorded for a package installed without a pinned version. */
export const UNPINNED_PACKAGE_VALUE = 'installed';

export interface PostconditionResult {
  holds: boolean;
  /** Resource key the predicate reads. */
  key: string;
  /** Observed value of that key, if any. */
  observed?: string;
  description: string;
}

/** The resource key a step writes and its postcondition reads. */
export function resourceKey(step: Step): string {
  const p = step.params;
  switch (step.kind) {
    case ActionKind.InstallPackage:
      return p.env ? `package:${p.env}/${p.name}` : `package:${p.name}`;
    case ActionKind.CreateInterpreterEnv:
      return `env:${p.name}:python-version`;
    case ActionKind.MutatePathVariable:
      return `envvar:${p.variable}`;
    case ActionKind.FetchArtifact:
      return `file:${p.destination}`;
    case ActionKind.SetPermission:
      return `mode:${p.path}`;
  }
}

/**
 * Whether concurrent writers of the same key compose (path-list appends) or
 * overwrite each other.
 */
export function isComposable(kind: ActionKind): boolean {
  return kind === ActionKind.MutatePathVariable;
}

/** Canonical octal form: "0755" and "755" both become "755". */
export function normalizeMode(mode: string): string {
  const parsed = parseInt(mode, 8);
  if (Number.isNaN(parsed)) return mode;
  return parsed.toString(8).padStart(3, '0');
}

/** Human-readable predicate. */
export function describePostcondition(step: Step): string {
  const key = resourceKey(step);
  const p = step.params;
  switch (step.kind) {
    case ActionKind.InstallPackage:
      return p.version ? `${key} == ${p.version}` : `${key} is present`;
    case ActionKind.CreateInterpreterEnv:
      return `${key} == ${p.pythonVersion}`;
    case ActionKind.MutatePathVariable:
      return p.after
        ? `${key} contains "${p.segment}" after "${p.after}"`
        : `${key} contains "${p.segment}"`;
    case ActionKind.FetchArtifact:
      return p.sha256 ? `${key} == sha256:${p.sha256.toLowerCase()}` : `${key} is present`;
    case ActionKind.SetPermission:
      return `${key} == ${normalizeMode(p.mode)}`;
  }
}

/** Evaluate a step's postcondition against a snapshot. Pure. */
export function evaluatePostcondition(step: Step, snapshot: Snapshot, separator: string): PostconditionResult {
  const key = resourceKey(step);
  const observed = snapshot.get(key);
  const description = describePostcondition(step);
  return { holds: predicateHolds(step, observed, separator), key, observed, description };
}

function predicateHolds(step: Step, observed: string | undefined, separator: string): boolean {
  const p = step.params;
  switch (step.kind) {
    case ActionKind.InstallPackage:
      return observed !== undefined && (!p.version || observed === p.version);
    case ActionKind.CreateInterpreterEnv:
      return observed === p.pythonVersion;
    case ActionKind.MutatePathVariable:
      return segmentSatisfied(observed, p.segment, separator, p.after);
    case ActionKind.FetchArtifact:
      return observed !== undefined && (!p.sha256 || observed.toLowerCase() === p.sha256.toLowerCase());
    case ActionKind.SetPermission:
      return observed !== undefined && normalizeMode(observed) === normalizeMode(p.mode);
  }
}
