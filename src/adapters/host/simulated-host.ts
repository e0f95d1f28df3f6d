/**
 * In-process simulated host.
 *
 * Records effects in memory instead of touching the machine. Failures,
 * latency and misreported values can be scripted per operation, which makes
 * it the host for `--simulate` runs and for tests.
 */

import { createHash } from 'crypto';
import {
  CreateInterpreterEnvRequest,
  FetchArtifactRequest,
  HostCallContext,
  InstallPackageRequest,
  ProvisioningHost,
  SetPermissionRequest,
} from './interface';

export type HostOperation = 'installPackage' | 'createInterpreterEnv' | 'fetchArtifact' | 'setPermission';

export interface HostCall {
  operation: HostOperation;
  /** Package name, env name, URL or path. */
  target: string;
  startedAt: number;
  finishedAt?: number;
}

interface ScriptedFailure {
  target?: string;
  error: Error;
  remaining: number;
}

export interface SimulatedHostOptions {
  /** Delay applied to every operation. */
  latencyMs?: number;
  /** Content served for fetch-artifact URLs; defaults to the URL itself. */
  artifacts?: Record<string, string>;
}

export class SimulatedHost implements ProvisioningHost {
  readonly calls: HostCall[] = [];
  readonly packages = new Map<string, string | undefined>();
  readonly envs = new Map<string, string>();
  readonly files = new Map<string, string>();
  readonly modes = new Map<string, string>();

  private failures = new Map<HostOperation, ScriptedFailure[]>();
  private misreports = new Map<string, string>();
  private latencyMs: number;
  private artifacts: Record<string, string>;

  constructor(options: SimulatedHostOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.artifacts = options.artifacts ?? {};
  }

  /** Make the next `times` calls of an operation (optionally for one target) throw. */
  failNext(operation: HostOperation, error: Error, times = 1, target?: string): this {
    const queue = this.failures.get(operation) ?? [];
    queue.push({ target, error, remaining: times });
    this.failures.set(operation, queue);
    return this;
  }

  /** Report `value` instead of the real outcome for a target. */
  misreport(target: string, value: string): this {
    this.misreports.set(target, value);
    return this;
  }

  /** Content digest the host reports for a URL. */
  digestFor(url: string): string {
    return createHash('sha256').update(this.artifacts[url] ?? url).digest('hex');
  }

  async installPackage(request: InstallPackageRequest, ctx: HostCallContext): Promise<{ version?: string }> {
    const target = request.env ? `${request.env}/${request.name}` : request.name;
    await this.begin('installPackage', target, ctx);
    this.packages.set(target, request.version);
    return { version: this.misreports.get(target) ?? request.version };
  }

  async createInterpreterEnv(
    request: CreateInterpreterEnvRequest,
    ctx: HostCallContext,
  ): Promise<{ pythonVersion: string }> {
    await this.begin('createInterpreterEnv', request.name, ctx);
    this.envs.set(request.name, request.pythonVersion);
    return { pythonVersion: this.misreports.get(request.name) ?? request.pythonVersion };
  }

  async fetchArtifact(request: FetchArtifactRequest, ctx: HostCallContext): Promise<{ sha256: string }> {
    await this.begin('fetchArtifact', request.url, ctx);
    const digest = this.misreports.get(request.url) ?? this.digestFor(request.url);
    this.files.set(request.destination, digest);
    return { sha256: digest };
  }

  async setPermission(request: SetPermissionRequest, ctx: HostCallContext): Promise<{ mode: string }> {
    await this.begin('setPermission', request.path, ctx);
    this.modes.set(request.path, request.mode);
    return { mode: this.misreports.get(request.path) ?? request.mode };
  }

  /** Number of calls made for an operation. */
  callCount(operation: HostOperation): number {
    return this.calls.filter((c) => c.operation === operation).length;
  }

  private async begin(operation: HostOperation, target: string, ctx: HostCallContext): Promise<void> {
    const call: HostCall = { operation, target, startedAt: Date.now() };
    this.calls.push(call);
    try {
      if (this.latencyMs > 0) {
        await delay(this.latencyMs, ctx.signal);
      }
      const failure = this.takeFailure(operation, target);
      if (failure) throw failure;
    } finally {
      call.finishedAt = Date.now();
    }
  }

  private takeFailure(operation: HostOperation, target: string): Error | undefined {
    const queue = this.failures.get(operation);
    if (!queue) return undefined;
    const index = queue.findIndex((f) => f.target === undefined || f.target === target);
    if (index === -1) return undefined;
    const entry = queue[index];
    entry.remaining -= 1;
    if (entry.remaining <= 0) queue.splice(index, 1);
    return entry.error;
  }
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      const err = new Error('Operation aborted');
      err.name = 'AbortError';
      reject(err);
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
}
