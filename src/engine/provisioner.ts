/**
 * Provisioning service.
 *
 * Ties compilation, execution, run records and verification together for the
 * CLI and the HTTP API.
 */

import { v4 as uuid } from 'uuid';
import { ProvisioningHost } from '../adapters/host/interface';
import {
  SpecValidationError,
  StrataError,
  TypedError,
  notFoundError,
  toTypedError,
} from '../domain/errors';
import { ProvisioningRun, RunStatus } from '../domain/run';
import { Snapshot, SnapshotState } from '../domain/snapshot';
import { ProvisioningSpec } from '../domain/step';
import { VerificationReport } from '../domain/verification';
import { CompilationResult, ExecutionPlan, compileSpec, compileValidated } from '../dsl/compiler';
import { StrataConfig } from '../config';
import { Logger, logger } from '../logger';
import { ValidationResult } from '../dsl/validator';
import { ListOptions, ListResult, Store } from '../storage/store';
import { ExecutorConfig, PreviewEntry, ProvisioningExecutor } from './executor';
import { verify } from './verifier';

export interface ProvisionOptions {
  /** State to start from; empty when omitted. */
  snapshot?: Snapshot | SnapshotState;
  retries?: number;
  parallel?: number;
  signal?: AbortSignal;
}

/** Compiled specification ready to run. */
export interface CompiledSpec {
  spec: ProvisioningSpec;
  plan: ExecutionPlan;
  warnings: string[];
}

/**
 * Validate and compile a specification document.
 *
 * @throws StrataError carrying the compiler's error when there is one, else a
 * SpecValidationError listing every schema violation
 */
export function compileOrThrow(source: unknown): CompiledSpec {
  return unwrapCompilation(compileSpec(source));
}

export function unwrapCompilation(result: CompilationResult): CompiledSpec {
  if (!result.success || !result.plan || !result.spec) {
    if (result.errors.length === 1) throw new StrataError(result.errors[0]);
    throw new SpecValidationError(result.errors);
  }
  return { spec: result.spec, plan: result.plan, warnings: result.validation.warnings };
}

/** The validated specification, or the validation errors thrown. */
export function unwrapValidation(result: ValidationResult): ProvisioningSpec {
  if (!result.valid || !result.spec) {
    if (result.errors.length === 1) throw new StrataError(result.errors[0]);
    throw new SpecValidationError(result.errors);
  }
  return result.spec;
}

/** Compile a parsed document, keeping the warnings of its validation. */
export function compileValidation(result: ValidationResult): CompiledSpec {
  return unwrapCompilation(compileValidated(unwrapValidation(result), result));
}

/** True for compile errors raised before anything runs (schema and graph). */
export function isSpecError(error: TypedError): boolean {
  return error.code.startsWith('VALIDATION.') || error.code.startsWith('GRAPH.');
}

export class ProvisioningService {
  private log: Logger;

  constructor(
    private store: Store,
    private host: ProvisioningHost,
    private config: StrataConfig,
    log: Logger = logger,
  ) {
    this.log = log.child({ module: 'provisioner' });
  }

  /** Compile a document into an execution plan. */
  plan(source: unknown): CompiledSpec {
    return compileOrThrow(source);
  }

  /** Which steps a run would apply, without invoking actions. */
  preview(source: unknown, snapshot?: Snapshot | SnapshotState): PreviewEntry[] {
    const { plan } = compileOrThrow(source);
    return this.executor().preview(plan, toSnapshot(snapshot));
  }

  /**
   * Compile and apply a specification, recording the run.
   *
   * Compile errors are thrown; anything that goes wrong once the run exists
   * is recorded on the run instead.
   */
  async provision(source: unknown, options: ProvisionOptions = {}): Promise<ProvisioningRun> {
    const { spec, plan } = compileOrThrow(source);
    const initial = toSnapshot(options.snapshot);

    const run: ProvisioningRun = {
      id: `run_${uuid()}`,
      specName: spec.name,
      spec,
      status: RunStatus.Running,
      planHash: plan.planHash,
      executionOrder: plan.order,
      results: [],
      snapshot: initial.toJSON(),
      startedAt: new Date().toISOString(),
    };
    await this.store.runs.create(run);

    let update: Partial<ProvisioningRun>;
    try {
      const outcome = await this.executor(options).apply(plan, initial, { signal: options.signal, runId: run.id });
      update = {
        status: outcome.status,
        results: outcome.results,
        snapshot: outcome.snapshot.toJSON(),
        error: outcome.error,
      };
    } catch (err) {
      const error = toTypedError(err);
      this.log.error('Run failed before any step ran', { runId: run.id, code: error.code, message: error.message });
      update = { status: RunStatus.Failed, error };
    }

    const completed = await this.store.runs.update(run.id, { ...update, completedAt: new Date().toISOString() });
    if (!completed) {
      throw new StrataError(notFoundError('Run', run.id));
    }
    return completed;
  }

  async getRun(runId: string): Promise<ProvisioningRun> {
    const run = await this.store.runs.getById(runId);
    if (!run) throw new StrataError(notFoundError('Run', runId));
    return run;
  }

  listRuns(options?: ListOptions): Promise<ListResult<ProvisioningRun>> {
    return this.store.runs.list(options);
  }

  /** Verify a recorded run's specification against its final snapshot. */
  async verifyRun(runId: string): Promise<VerificationReport> {
    const run = await this.getRun(runId);
    const { spec, plan } = compileOrThrow(run.spec);
    return verify(spec.steps, new Snapshot(run.snapshot), run.results, { pathSeparator: plan.pathSeparator });
  }

  private executor(options: Pick<ProvisionOptions, 'retries' | 'parallel'> = {}): ProvisioningExecutor {
    const config: ExecutorConfig = {
      retries: options.retries ?? this.config.retries,
      parallel: options.parallel ?? this.config.parallel,
      backoffBaseMs: this.config.backoffBaseMs,
      backoffMaxMs: this.config.backoffMaxMs,
      timeouts: this.config.timeouts,
    };
    return new ProvisioningExecutor(this.host, config, this.log);
  }
}

function toSnapshot(value: Snapshot | SnapshotState | undefined): Snapshot {
  if (!value) return Snapshot.empty();
  return value instanceof Snapshot ? value : new Snapshot(value);
}
