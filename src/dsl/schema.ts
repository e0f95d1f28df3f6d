/**
 * Provisioning specification schema definitions.
 *
 * Parameter contracts per action kind and document-level constraints.
 */

import { ActionKind } from '../domain/step';

/** Parameter contract for one action kind. */
export interface ParamContract {
  required: readonly string[];
  optional: readonly string[];
}

export const PARAM_CONTRACTS: Record<ActionKind, ParamContract> = {
  [ActionKind.InstallPackage]: { required: ['name'], optional: ['version', 'env', 'manager'] },
  [ActionKind.CreateInterpreterEnv]: { required: ['name', 'pythonVersion'], optional: [] },
  [ActionKind.MutatePathVariable]: { required: ['variable', 'segment'], optional: ['after'] },
  [ActionKind.FetchArtifact]: { required: ['url', 'destination'], optional: ['sha256'] },
  [ActionKind.SetPermission]: { required: ['path', 'mode'], optional: [] },
};

/** Package managers an install-package step may name. */
export const VALID_PACKAGE_MANAGERS = ['pip', 'conda', 'apt'] as const;
export type PackageManager = (typeof VALID_PACKAGE_MANAGERS)[number];

/** Required top-level fields of a specification document. */
export const REQUIRED_SPEC_FIELDS = ['specVersion', 'name', 'steps'] as const;

/** Required fields of a step. */
export const REQUIRED_STEP_FIELDS = ['id', 'kind', 'params'] as const;

/** Fields a step may carry. */
export const KNOWN_STEP_FIELDS = ['id', 'kind', 'params', 'requires', 'description'] as const;

/** Validation constraints. */
export const SCHEMA_CONSTRAINTS = {
  maxSteps: 500,
  maxIdLength: 128,
  maxNameLength: 256,
  idPattern: /^[A-Za-z0-9][A-Za-z0-9_.:-]*$/,
  modePattern: /^[0-7]{3,4}$/,
  sha256Pattern: /^[a-fA-F0-9]{64}$/,
} as const;
