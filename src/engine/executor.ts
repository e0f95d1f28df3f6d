/**
 * Provisioning Executor: the core orchestration engine.
 *
 * Applies a compiled plan to a snapshot. Each step is skipped when its
 * postcondition already holds, otherwise its action runs under the step
 * runner's retry/timeout policy and the resulting writes are committed only
 * after the postcondition is confirmed against the staged state.
 *
 * Sequential and concurrent runs share one scheduler: ready steps are
 * dispatched in plan order to at most `parallel` slots, and a step waits
 * while another in-flight step holds its resource key. Commits are
 * synchronous, so the snapshot has a single writer path.
 */

import { ProvisioningHost } from '../adapters/host/interface';
import { ConflictError, TypedError, postconditionNotMetError, runCanceledError } from '../domain/errors';
import { RunStatus, StepResult, StepResultStatus } from '../domain/run';
import { Snapshot } from '../domain/snapshot';
import { ActionKind, Step } from '../domain/step';
import { ExecutionPlan, transitivePrerequisites } from '../dsl/compiler';
import { DEFAULT_CONFIG } from '../config';
import { Logger, logger } from '../logger';
import { evaluatePostcondition, isComposable, resourceKey } from './postconditions';
import { StepPolicy, runAction } from './step-runner';

/** Executor configuration. */
export interface ExecutorConfig {
  /** Retries after the first attempt for retryable kinds. */
  retries: number;
  /** Worker pool size; 1 runs steps one at a time in plan order. */
  parallel: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  timeouts: Record<ActionKind, number>;
}

export interface ApplyOptions {
  /** Aborting stops dispatch of new steps; in-flight steps finish. */
  signal?: AbortSignal;
  /** Correlation id for log lines. */
  runId?: string;
}

export interface ApplyOutcome {
  /** The input snapshot with every committed step applied. */
  snapshot: Snapshot;
  /** Execution log in completion order. */
  results: StepResult[];
  status: RunStatus.Succeeded | RunStatus.Failed | RunStatus.Canceled;
  error?: TypedError;
}

/** What a dry run reports for one step. */
export interface PreviewEntry {
  stepId: string;
  action: 'apply' | 'skip';
  postcondition: string;
  observed?: string;
}

export class ProvisioningExecutor {
  private config: ExecutorConfig;
  private log: Logger;

  constructor(
    private host: ProvisioningHost,
    config?: Partial<ExecutorConfig>,
    log: Logger = logger,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.log = log.child({ module: 'executor' });
  }

  /**
   * Apply a plan. The input snapshot is not modified; the returned snapshot
   * is a copy carrying every commit made before the run ended.
   *
   * @throws ConflictError in concurrent mode when two unordered steps write
   * the same exclusive resource key. Nothing runs in that case.
   */
  async apply(plan: ExecutionPlan, initial: Snapshot, options: ApplyOptions = {}): Promise<ApplyOutcome> {
    const parallel = Math.max(1, this.config.parallel);
    if (parallel > 1) {
      const conflict = findConflict(plan);
      if (conflict) throw new ConflictError(conflict.stepIds, conflict.key);
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (options.signal?.aborted) forwardAbort();

    const log = this.log.child({ runId: options.runId, spec: plan.specName });
    const snapshot = initial.clone();
    const results: StepResult[] = [];
    const pending = [...plan.order];
    const completed = new Set<string>();
    const lockedKeys = new Set<string>();
    const inFlight = new Map<string, Promise<void>>();
    const halt: { error?: TypedError } = {};

    log.info('Provisioning started', { steps: plan.order.length, parallel, revision: snapshot.revision });

    try {
      for (;;) {
        if (!halt.error && !controller.signal.aborted) {
          for (let i = 0; i < pending.length && inFlight.size < parallel; ) {
            const step = plan.steps[pending[i]];
            const key = resourceKey(step);
            if (!step.requires.every((dep) => completed.has(dep)) || lockedKeys.has(key)) {
              i++;
              continue;
            }
            pending.splice(i, 1);
            lockedKeys.add(key);
            const task = this.runStep(step, snapshot, plan.pathSeparator, controller.signal, log).then((result) => {
              results.push(result);
              lockedKeys.delete(key);
              inFlight.delete(step.id);
              if (result.status === StepResultStatus.Failed) {
                halt.error ??= result.error;
              } else {
                completed.add(step.id);
              }
            });
            inFlight.set(step.id, task);
          }
        }
        if (inFlight.size === 0) break;
        await Promise.race(inFlight.values());
      }
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    const canceled =
      controller.signal.aborted && (pending.length > 0 || halt.error?.code === 'RUN.CANCELED');
    const status = canceled ? RunStatus.Canceled : halt.error ? RunStatus.Failed : RunStatus.Succeeded;
    const error = canceled ? runCanceledError(options.runId ?? plan.specName, cancelReason(controller.signal)) : halt.error;

    const summary = {
      status,
      applied: results.filter((r) => r.status === StepResultStatus.Applied).length,
      skipped: results.filter((r) => r.status === StepResultStatus.Skipped).length,
      notRun: pending.length,
      revision: snapshot.revision,
    };
    if (status === RunStatus.Succeeded) {
      log.info('Provisioning finished', summary);
    } else {
      log.warn('Provisioning stopped', { ...summary, code: error?.code, stepId: error?.stepId });
    }

    return { snapshot, results, status, error };
  }

  /** Report which steps a run would apply, without invoking any action. */
  preview(plan: ExecutionPlan, snapshot: Snapshot): PreviewEntry[] {
    return plan.order.map((id) => {
      const result = evaluatePostcondition(plan.steps[id], snapshot, plan.pathSeparator);
      return {
        stepId: id,
        action: result.holds ? 'skip' : 'apply',
        postcondition: result.description,
        observed: result.observed,
      };
    });
  }

  private policyFor(kind: ActionKind): StepPolicy {
    return {
      maxRetries: this.config.retries,
      timeoutMs: this.config.timeouts[kind],
      backoffBaseMs: this.config.backoffBaseMs,
      backoffMaxMs: this.config.backoffMaxMs,
    };
  }

  private async runStep(
    step: Step,
    snapshot: Snapshot,
    pathSeparator: string,
    cancel: AbortSignal,
    log: Logger,
  ): Promise<StepResult> {
    const started = Date.now();
    const finish = (fields: Omit<StepResult, 'stepId' | 'startedAt' | 'completedAt' | 'durationMs'>): StepResult => {
      const completed = Date.now();
      return {
        stepId: step.id,
        startedAt: new Date(started).toISOString(),
        completedAt: new Date(completed).toISOString(),
        durationMs: completed - started,
        ...fields,
      };
    };

    const before = evaluatePostcondition(step, snapshot, pathSeparator);
    if (before.holds) {
      log.debug('Step skipped', { stepId: step.id, postcondition: before.description });
      return finish({ status: StepResultStatus.Skipped, attempts: 0 });
    }

    const outcome = await runAction(
      step,
      { host: this.host, snapshot, pathSeparator, cancel },
      this.policyFor(step.kind),
      (attempt, error, delayMs) =>
        log.warn('Step attempt failed, retrying', { stepId: step.id, attempt, delayMs, code: error.code, reason: error.message }),
    );

    if (!outcome.ok) {
      log.error('Step failed', { stepId: step.id, attempts: outcome.attempts, code: outcome.error.code, reason: outcome.error.message });
      return finish({ status: StepResultStatus.Failed, attempts: outcome.attempts, error: outcome.error });
    }

    const after = evaluatePostcondition(step, snapshot.preview(outcome.writes), pathSeparator);
    if (!after.holds) {
      const error = postconditionNotMetError(step.id, after.description, after.observed);
      log.error('Step postcondition not met', { stepId: step.id, postcondition: after.description, observed: after.observed });
      return finish({ status: StepResultStatus.Failed, attempts: outcome.attempts, error });
    }

    const revision = snapshot.commit(outcome.writes);
    log.info('Step applied', { stepId: step.id, attempts: outcome.attempts, revision });
    return finish({ status: StepResultStatus.Applied, attempts: outcome.attempts, revision });
  }
}

/**
 * First pair of steps, in plan order, that write the same exclusive resource
 * key while neither transitively requires the other.
 */
export function findConflict(plan: ExecutionPlan): { stepIds: [string, string]; key: string } | undefined {
  const prerequisites = transitivePrerequisites(plan);
  const writers = new Map<string, string[]>();

  for (const id of plan.order) {
    const step = plan.steps[id];
    if (isComposable(step.kind)) continue;
    const key = resourceKey(step);
    const earlier = writers.get(key) ?? [];
    for (const other of earlier) {
      const ordered = prerequisites.get(id)?.has(other) || prerequisites.get(other)?.has(id);
      if (!ordered) return { stepIds: [other, id], key };
    }
    writers.set(key, [...earlier, id]);
  }
  return undefined;
}

function cancelReason(signal: AbortSignal): string | undefined {
  return typeof signal.reason === 'string' ? signal.reason : undefined;
}
