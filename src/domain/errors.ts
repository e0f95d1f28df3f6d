/**
 * Typed error model for machine-actionable error handling.
 *
 * Step results, verification reports, API responses and CLI output all carry
 * a TypedError payload. Code paths that must abort (plan compilation, snapshot
 * loading) throw a StrataError subclass that wraps one.
 */

/** Typed suggested fix that an operator or tool can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "GRAPH.CYCLE"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated step if applicable. */
  stepId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stepId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stepId: params.stepId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class for thrown errors. Carries the typed payload. */
export class StrataError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'StrataError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

// --- Dependency graph errors (fatal, raised before any mutation) ---

export class CycleError extends StrataError {
  constructor(public readonly cycle: string[]) {
    super(
      createTypedError({
        code: 'GRAPH.CYCLE',
        message: `Prerequisite cycle detected: ${cycle.join(' → ')}`,
        stepId: cycle[0],
        details: { cycle },
        suggestedFixes: [
          {
            type: 'REMOVE_PREREQUISITE',
            params: { stepId: cycle[cycle.length - 2], prerequisite: cycle[cycle.length - 1] },
            description: 'Break the cycle by removing one prerequisite edge',
          },
        ],
      }),
    );
    this.name = 'CycleError';
  }
}

export class UnknownPrerequisiteError extends StrataError {
  constructor(
    public readonly stepId: string,
    public readonly missingId: string,
  ) {
    super(
      createTypedError({
        code: 'GRAPH.UNKNOWN_PREREQUISITE',
        message: `Step "${stepId}" requires unknown step "${missingId}"`,
        stepId,
        details: { missingId },
        suggestedFixes: [
          {
            type: 'DECLARE_STEP',
            params: { stepId: missingId },
            description: `Declare step "${missingId}" or remove it from "${stepId}".requires`,
          },
        ],
      }),
    );
    this.name = 'UnknownPrerequisiteError';
  }
}

export class DuplicateStepError extends StrataError {
  constructor(
    public readonly stepId: string,
    indices: number[],
  ) {
    super(
      createTypedError({
        code: 'GRAPH.DUPLICATE_STEP',
        message: `Step id "${stepId}" is declared more than once (positions ${indices.join(', ')})`,
        stepId,
        details: { indices },
      }),
    );
    this.name = 'DuplicateStepError';
  }
}

/** Thrown by compileSpec callers that need an exception instead of a result. */
export class SpecValidationError extends StrataError {
  constructor(public readonly errors: TypedError[]) {
    super(
      createTypedError({
        code: 'VALIDATION.SPEC',
        message: errors.map((e) => e.message).join('; ') || 'Invalid provisioning specification',
        details: { errors },
      }),
    );
    this.name = 'SpecValidationError';
  }
}

// --- Action errors (raised by provisioning hosts and actions) ---

/**
 * Failure likely to succeed on retry (timeouts, connection resets).
 * The step runner retries these for network/filesystem kinds.
 */
export class TransientActionError extends Error {
  constructor(
    message: string,
    public readonly reason: string = 'transient',
  ) {
    super(message);
    this.name = 'TransientActionError';
  }
}

/**
 * Failure that will not go away on retry (checksum mismatch, permission
 * denied, package not found). The step runner fails the step immediately.
 */
export class NonTransientActionError extends Error {
  constructor(
    message: string,
    public readonly reason: string = 'non-transient',
  ) {
    super(message);
    this.name = 'NonTransientActionError';
  }
}

// --- Execution and verification errors ---

export class ConflictError extends StrataError {
  constructor(
    public readonly stepIds: [string, string],
    public readonly resourceKey: string,
  ) {
    super(conflictError(stepIds, resourceKey));
    this.name = 'ConflictError';
  }
}

export class SnapshotSchemaError extends StrataError {
  constructor(filePath: string, found: unknown, expected: number) {
    super(
      createTypedError({
        code: 'SNAPSHOT.SCHEMA_MISMATCH',
        message:
          typeof found === 'number' && found < expected
            ? `Snapshot ${filePath} uses schema version ${found}; expected ${expected}. ` +
              `Re-run "strata provision" to regenerate it, or migrate it with "strata migrate-snapshot".`
            : `Snapshot ${filePath} has unsupported schema version ${String(found)}; expected ${expected}.`,
        details: { filePath, found, expected },
        suggestedFixes: [
          {
            type: 'REPROVISION',
            params: { filePath },
            description: 'Provision again to write a snapshot in the current schema',
          },
        ],
      }),
    );
    this.name = 'SnapshotSchemaError';
  }
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function actionTimeoutError(stepId: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'ACTION.TIMEOUT',
    message: `Action timed out after ${timeoutMs}ms`,
    stepId,
    retryable: true,
    details: { timeoutMs, attempt },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
  });
}

export function transientActionError(stepId: string, message: string, attempt: number, maxAttempts: number): TypedError {
  return createTypedError({
    code: 'ACTION.TRANSIENT',
    message,
    stepId,
    retryable: true,
    details: { attempt, maxAttempts },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: {}, description: 'Retry once the network or host recovers' }],
  });
}

export function nonTransientActionError(stepId: string, message: string, reason: string, attempt: number): TypedError {
  return createTypedError({
    code: 'ACTION.NON_TRANSIENT',
    message,
    stepId,
    retryable: false,
    details: { reason, attempt },
  });
}

export function postconditionNotMetError(stepId: string, postcondition: string, observed: string | undefined): TypedError {
  return createTypedError({
    code: 'STEP.POSTCONDITION_NOT_MET',
    message: `Step "${stepId}" reported success but its postcondition does not hold: ${postcondition}`,
    stepId,
    retryable: false,
    details: { postcondition, observed: observed ?? null },
    suggestedFixes: [
      {
        type: 'FIX_STEP_DEFINITION',
        params: { stepId },
        description: 'The action and its postcondition disagree; fix the step parameters or the action',
      },
    ],
  });
}

export function conflictError(stepIds: [string, string], resourceKey: string): TypedError {
  return createTypedError({
    code: 'STEP.CONFLICT',
    message: `Steps "${stepIds[0]}" and "${stepIds[1]}" both write "${resourceKey}" with no prerequisite ordering between them`,
    stepId: stepIds[1],
    retryable: false,
    details: { stepIds, resourceKey },
    suggestedFixes: [
      {
        type: 'ADD_PREREQUISITE',
        params: { stepId: stepIds[1], prerequisite: stepIds[0] },
        description: `Make "${stepIds[1]}" require "${stepIds[0]}"`,
      },
    ],
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    retryable: false,
    details: { runId, ...(reason ? { reason } : {}) },
  });
}

/** Normalize any thrown value into a TypedError. */
export function toTypedError(err: unknown): TypedError {
  if (err instanceof StrataError) return err.typedError;
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/** A retryable step stopped between attempts because its run was canceled. */
export function stepCanceledError(stepId: string, reason: string | undefined, attempt: number, lastError: TypedError): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    stepId,
    retryable: false,
    details: { attempt, lastCode: lastError.code, lastMessage: lastError.message, ...(reason ? { reason } : {}) },
  });
}
