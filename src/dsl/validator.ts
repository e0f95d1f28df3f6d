/**
 * Specification validator.
 *
 * Validates a parsed (untyped) specification document against the schema and
 * returns a typed ProvisioningSpec when it is structurally sound. Graph-level
 * checks (unknown prerequisites, cycles) belong to the compiler.
 */

import path from 'path';
import { TypedError, createTypedError } from '../domain/errors';
import { ActionKind, ACTION_KINDS, ProvisioningSpec, Step, isActionKind } from '../domain/step';
import {
  KNOWN_STEP_FIELDS,
  PARAM_CONTRACTS,
  REQUIRED_SPEC_FIELDS,
  REQUIRED_STEP_FIELDS,
  SCHEMA_CONSTRAINTS,
  VALID_PACKAGE_MANAGERS,
} from './schema';
import { CURRENT_SPEC_VERSION, isSupportedVersion } from './version';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
  /** Normalized document, present when valid. */
  spec?: ProvisioningSpec;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Validate a specification document. */
export function validateSpec(document: unknown): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (!isRecord(document)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.NOT_AN_OBJECT',
        message: 'Specification must be a mapping with specVersion, name and steps',
      }),
    );
    return { valid: false, errors, warnings };
  }

  for (const field of REQUIRED_SPEC_FIELDS) {
    if (document[field] === undefined || document[field] === null) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.REQUIRED_FIELD',
          message: `Missing required field: ${field}`,
          suggestedFixes: [{ type: 'ADD_FIELD', params: { field }, description: `Provide the "${field}" field` }],
        }),
      );
    }
  }
  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  const specVersion = document.specVersion;
  if (typeof specVersion !== 'string' || !isSupportedVersion(specVersion)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.UNSUPPORTED_VERSION',
        message: `Unsupported spec version: ${String(specVersion)}`,
        suggestedFixes: [
          {
            type: 'USE_VERSION',
            params: { specVersion: CURRENT_SPEC_VERSION },
            description: `Use supported version ${CURRENT_SPEC_VERSION}`,
          },
        ],
      }),
    );
  }

  const name = document.name;
  if (typeof name !== 'string' || name.length === 0) {
    errors.push(createTypedError({ code: 'VALIDATION.INVALID_NAME', message: 'name must be a non-empty string' }));
  } else if (name.length > SCHEMA_CONSTRAINTS.maxNameLength) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.NAME_TOO_LONG',
        message: `name exceeds ${SCHEMA_CONSTRAINTS.maxNameLength} characters`,
      }),
    );
  }

  const description = optionalString(document, 'description', 'spec', errors);
  const pathSeparator = optionalString(document, 'pathSeparator', 'spec', errors);
  if (pathSeparator !== undefined && pathSeparator.length !== 1) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_SEPARATOR',
        message: `pathSeparator must be a single character, got "${pathSeparator}"`,
      }),
    );
  }

  const separator = pathSeparator !== undefined && pathSeparator.length === 1 ? pathSeparator : path.delimiter;
  const steps = validateSteps(document.steps, separator, errors, warnings);

  if (errors.length > 0 || typeof name !== 'string' || typeof specVersion !== 'string') {
    return { valid: false, errors, warnings };
  }

  const spec: ProvisioningSpec = {
    specVersion,
    name,
    ...(description !== undefined ? { description } : {}),
    ...(pathSeparator !== undefined ? { pathSeparator } : {}),
    steps,
  };
  return { valid: true, errors, warnings, spec };
}

function validateSteps(raw: unknown, separator: string, errors: TypedError[], warnings: string[]): Step[] {
  if (!Array.isArray(raw)) {
    errors.push(createTypedError({ code: 'VALIDATION.INVALID_STEPS', message: 'steps must be a list' }));
    return [];
  }
  if (raw.length === 0) {
    errors.push(
      createTypedError({ code: 'VALIDATION.EMPTY_STEPS', message: 'Specification must declare at least one step' }),
    );
    return [];
  }
  if (raw.length > SCHEMA_CONSTRAINTS.maxSteps) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.TOO_MANY_STEPS',
        message: `Specification exceeds maximum of ${SCHEMA_CONSTRAINTS.maxSteps} steps`,
      }),
    );
  }

  const steps: Step[] = [];
  raw.forEach((entry: unknown, index: number) => {
    const step = validateStep(entry, index, separator, errors, warnings);
    if (step) steps.push(step);
  });
  return steps;
}

function validateStep(
  entry: unknown,
  index: number,
  separator: string,
  errors: TypedError[],
  warnings: string[],
): Step | undefined {
  if (!isRecord(entry)) {
    errors.push(
      createTypedError({ code: 'VALIDATION.INVALID_STEP', message: `Step at position ${index} must be a mapping` }),
    );
    return undefined;
  }

  const label = typeof entry.id === 'string' ? entry.id : `#${index}`;
  const before = errors.length;

  for (const field of REQUIRED_STEP_FIELDS) {
    if (entry[field] === undefined || entry[field] === null) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.STEP_MISSING_FIELD',
          message: `Step "${label}": missing required field "${field}"`,
          stepId: typeof entry.id === 'string' ? entry.id : undefined,
        }),
      );
    }
  }
  if (errors.length > before) return undefined;

  for (const field of Object.keys(entry)) {
    if (!(KNOWN_STEP_FIELDS as readonly string[]).includes(field)) {
      warnings.push(`Step "${label}": unknown field "${field}" is ignored`);
    }
  }

  const id = entry.id;
  if (typeof id !== 'string' || !SCHEMA_CONSTRAINTS.idPattern.test(id) || id.length > SCHEMA_CONSTRAINTS.maxIdLength) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_STEP_ID',
        message: `Step "${label}": id must match ${SCHEMA_CONSTRAINTS.idPattern.source} and be at most ${SCHEMA_CONSTRAINTS.maxIdLength} characters`,
      }),
    );
    return undefined;
  }

  const kind = entry.kind;
  if (!isActionKind(kind)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_KIND',
        message: `Step "${id}": invalid kind "${String(kind)}"`,
        stepId: id,
        suggestedFixes: [
          { type: 'SET_KIND', params: { validKinds: [...ACTION_KINDS] }, description: 'Use a valid action kind' },
        ],
      }),
    );
    return undefined;
  }

  const params = validateParams(id, kind, entry.params, separator, errors, warnings);
  const requires = validateRequires(id, entry.requires, errors);
  const description = optionalString(entry, 'description', `Step "${id}"`, errors);

  if (errors.length > before || !params) return undefined;

  return {
    id,
    kind,
    params,
    requires,
    ...(description !== undefined ? { description } : {}),
  };
}

function validateParams(
  stepId: string,
  kind: ActionKind,
  raw: unknown,
  separator: string,
  errors: TypedError[],
  warnings: string[],
): Record<string, string> | undefined {
  if (!isRecord(raw)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_PARAMS',
        message: `Step "${stepId}": params must be a mapping of strings`,
        stepId,
      }),
    );
    return undefined;
  }

  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    // Assigning this key would replace the prototype instead of adding a param.
    if (key === '__proto__') {
      warnings.push(`Step "${stepId}": param "__proto__" is not allowed and is ignored`);
      continue;
    }
    if (typeof value !== 'string') {
      errors.push(
        createTypedError({
          code: 'VALIDATION.PARAM_NOT_STRING',
          message: `Step "${stepId}": param "${key}" must be a string, got ${typeof value}`,
          stepId,
          suggestedFixes: [
            { type: 'QUOTE_VALUE', params: { key }, description: `Quote the value of "${key}" (e.g. "3.10")` },
          ],
        }),
      );
      continue;
    }
    params[key] = value;
  }

  const contract = PARAM_CONTRACTS[kind];
  for (const key of contract.required) {
    if (params[key] === undefined || params[key].length === 0) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.MISSING_PARAM',
          message: `Step "${stepId}": ${kind} requires param "${key}"`,
          stepId,
          suggestedFixes: [{ type: 'ADD_PARAM', params: { key, stepId } }],
        }),
      );
    }
  }
  for (const key of Object.keys(params)) {
    if (!contract.required.includes(key) && !contract.optional.includes(key)) {
      warnings.push(`Step "${stepId}": param "${key}" is not used by ${kind}`);
    }
  }

  validateParamValues(stepId, kind, params, separator, errors);
  return params;
}

function validateParamValues(
  stepId: string,
  kind: ActionKind,
  params: Record<string, string>,
  separator: string,
  errors: TypedError[],
): void {
  if (kind === ActionKind.SetPermission && params.mode !== undefined && !SCHEMA_CONSTRAINTS.modePattern.test(params.mode)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_MODE',
        message: `Step "${stepId}": mode "${params.mode}" is not an octal permission such as 755`,
        stepId,
      }),
    );
  }

  if (kind === ActionKind.FetchArtifact && params.sha256 !== undefined && !SCHEMA_CONSTRAINTS.sha256Pattern.test(params.sha256)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_CHECKSUM',
        message: `Step "${stepId}": sha256 must be 64 hex characters`,
        stepId,
      }),
    );
  }

  if (
    kind === ActionKind.InstallPackage &&
    params.manager !== undefined &&
    !(VALID_PACKAGE_MANAGERS as readonly string[]).includes(params.manager)
  ) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_MANAGER',
        message: `Step "${stepId}": manager "${params.manager}" is not one of ${VALID_PACKAGE_MANAGERS.join(', ')}`,
        stepId,
      }),
    );
  }

  if (kind === ActionKind.MutatePathVariable && params.after !== undefined && params.after === params.segment) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_POSITION',
        message: `Step "${stepId}": segment cannot be required to follow itself`,
        stepId,
      }),
    );
  }

  if (kind === ActionKind.MutatePathVariable) {
    for (const key of ['segment', 'after']) {
      const value = params[key];
      if (value === undefined || !value.includes(separator)) continue;
      errors.push(
        createTypedError({
          code: 'VALIDATION.INVALID_SEGMENT',
          message: `Step "${stepId}": ${key} "${value}" contains the path separator "${separator}"`,
          stepId,
          details: { param: key, separator },
          suggestedFixes: [
            {
              type: 'SPLIT_STEP',
              params: { stepId },
              description: 'Add one mutate-path-variable step per segment',
            },
          ],
        }),
      );
    }
  }
}

function validateRequires(stepId: string, raw: unknown, errors: TypedError[]): string[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_REQUIRES',
        message: `Step "${stepId}": requires must be a list of step ids`,
        stepId,
      }),
    );
    return [];
  }
  const requires: string[] = [];
  for (const dep of raw) {
    if (typeof dep !== 'string') {
      errors.push(
        createTypedError({
          code: 'VALIDATION.INVALID_REQUIRES',
          message: `Step "${stepId}": requires entries must be strings`,
          stepId,
        }),
      );
      continue;
    }
    requires.push(dep);
  }
  return requires;
}

function optionalString(
  record: Record<string, unknown>,
  field: string,
  label: string,
  errors: TypedError[],
): string | undefined {
  const value = record[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_FIELD',
        message: `${label}: ${field} must be a string`,
      }),
    );
    return undefined;
  }
  return value;
}
