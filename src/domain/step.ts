/**
 * Provisioning step domain model.
 *
 * A provisioning specification is an ordered list of steps. Each step is one
 * idempotent action with string parameters and declared prerequisites; its
 * postcondition is derived from its kind and parameters.
 */

/** Action kinds a step can perform. */
export enum ActionKind {
  InstallPackage = 'install-package',
  CreateInterpreterEnv = 'create-interpreter-env',
  MutatePathVariable = 'mutate-path-variable',
  FetchArtifact = 'fetch-artifact',
  SetPermission = 'set-permission',
}

export const ACTION_KINDS: readonly ActionKind[] = Object.values(ActionKind);

export function isActionKind(value: unknown): value is ActionKind {
  return typeof value === 'string' && (ACTION_KINDS as readonly string[]).includes(value);
}

/** A single provisioning step as declared in the specification. */
export interface Step {
  id: string;
  kind: ActionKind;
  params: Record<string, string>;
  /** Identifiers of steps whose postconditions this step relies on. */
  requires: string[];
  description?: string;
}

/** The provisioning specification document. */
export interface ProvisioningSpec {
  /** Document format version (see dsl/version). */
  specVersion: string;
  name: string;
  description?: string;
  /** Path-list separator for mutate-path-variable; defaults to the platform's. */
  pathSeparator?: string;
  steps: Step[];
}
