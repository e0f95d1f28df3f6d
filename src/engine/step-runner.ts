/**
 * Step runner: runs one step's action under its retry and timeout policy.
 *
 * Retryable kinds (fetch-artifact, install-package) are retried up to
 * `maxRetries` times on transient failures with exponential backoff; every
 * other kind, and every non-transient failure, gets a single attempt.
 */

import {
  NonTransientActionError,
  TransientActionError,
  TypedError,
  actionTimeoutError,
  createTypedError,
  nonTransientActionError,
  stepCanceledError,
  transientActionError,
} from '../domain/errors';
import { ResourceWrites } from '../domain/snapshot';
import { Step } from '../domain/step';
import { classifyError } from '../adapters/host/classify';
import { ActionContext, getActionHandler } from './actions';

/** Retry and timeout policy for one step. */
export interface StepPolicy {
  /** Retries after the first attempt, for retryable kinds. */
  maxRetries: number;
  timeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export type ActionOutcome =
  | { ok: true; writes: ResourceWrites; attempts: number }
  | { ok: false; error: TypedError; attempts: number };

/**
 * Run a step's action. Never throws; failures are returned as typed errors.
 * Aborting `cancel` during a retry backoff ends the step with RUN.CANCELED.
 */
export async function runAction(
  step: Step,
  context: Omit<ActionContext, 'signal' | 'timeoutMs'> & { cancel: AbortSignal },
  policy: StepPolicy,
  onRetry?: (attempt: number, error: TypedError, delayMs: number) => void,
): Promise<ActionOutcome> {
  const handler = getActionHandler(step.kind);
  if (!handler) {
    return {
      ok: false,
      attempts: 0,
      error: createTypedError({
        code: 'STEP.NO_HANDLER',
        message: `No handler registered for action kind "${step.kind}"`,
        stepId: step.id,
      }),
    };
  }

  const maxAttempts = handler.retryable ? 1 + Math.max(0, policy.maxRetries) : 1;
  let lastError: TypedError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    // Only the timeout aborts an attempt; cancellation lets it finish.
    const attemptController = new AbortController();

    try {
      const writes = await executeWithTimeout(
        () =>
          handler.execute(step, {
            host: context.host,
            snapshot: context.snapshot,
            pathSeparator: context.pathSeparator,
            signal: attemptController.signal,
            timeoutMs: policy.timeoutMs,
          }),
        policy.timeoutMs,
        attemptController,
      );
      return { ok: true, writes, attempts: attempt };
    } catch (err) {
      const classified = err instanceof TimeoutError ? err : classifyError(err, step.kind);

      if (classified instanceof NonTransientActionError) {
        return {
          ok: false,
          attempts: attempt,
          error: nonTransientActionError(step.id, classified.message, classified.reason, attempt),
        };
      }

      lastError =
        classified instanceof TimeoutError
          ? actionTimeoutError(step.id, policy.timeoutMs, attempt)
          : transientActionError(step.id, classified.message, attempt, maxAttempts);

      if (attempt < maxAttempts && !context.cancel.aborted) {
        const delayMs = computeBackoff(policy.backoffBaseMs, policy.backoffMaxMs, attempt);
        onRetry?.(attempt, lastError, delayMs);
        await sleep(delayMs, context.cancel);
      }
      if (attempt < maxAttempts && context.cancel.aborted) {
        return {
          ok: false,
          attempts: attempt,
          error: stepCanceledError(step.id, cancelReason(context.cancel), attempt, lastError),
        };
      }
    }
  }

  return {
    ok: false,
    attempts: maxAttempts,
    error: lastError
      ? { ...lastError, retryable: false, details: { ...lastError.details, exhausted: true } }
      : createTypedError({ code: 'ACTION.TRANSIENT', message: 'Retries exhausted', stepId: step.id }),
  };
}

/** Execute a function with a timeout; the controller is aborted when it fires. */
async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  controller: AbortController,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export class TimeoutError extends TransientActionError {
  constructor(public timeoutMs: number) {
    super(`Action timed out after ${timeoutMs}ms`, 'timeout');
    this.name = 'TimeoutError';
  }
}

/** Exponential backoff: base * 2^(attempt-1), capped. */
export function computeBackoff(baseMs: number, maxMs: number, attempt: number): number {
  return Math.min(maxMs, baseMs * Math.pow(2, attempt - 1));
}

function cancelReason(signal: AbortSignal): string | undefined {
  return typeof signal.reason === 'string' ? signal.reason : undefined;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
