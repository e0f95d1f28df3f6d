/**
 * Action handlers: one per action kind.
 *
 * A handler performs its side effect through the provisioning host and
 * returns the resource writes that describe the result. Handlers are
 * stateless; the host and snapshot arrive in the context.
 */

import { ProvisioningHost } from '../adapters/host/interface';
import { ResourceWrites, Snapshot } from '../domain/snapshot';
import { ActionKind, Step } from '../domain/step';
import { PackageManager, VALID_PACKAGE_MANAGERS } from '../dsl/schema';
import { appendSegment } from './path-list';
import { UNPINNED_PACKAGE_VALUE, resourceKey } from './postconditions';

/** Context provided to a handler for one attempt. */
export interface ActionContext {
  host: ProvisioningHost;
  /** Current state; handlers read it but never write it. */
  snapshot: Snapshot;
  pathSeparator: string;
  signal: AbortSignal;
  timeoutMs: number;
}

/** Handler interface: pluggable action implementations. */
export interface ActionHandler {
  kind: ActionKind;
  /** Network- or filesystem-bound kinds whose transient failures are retried. */
  retryable: boolean;
  execute(step: Step, context: ActionContext): Promise<ResourceWrites>;
}

function packageManager(value: string | undefined): PackageManager {
  return VALID_PACKAGE_MANAGERS.find((m) => m === value) ?? 'pip';
}

const installPackage: ActionHandler = {
  kind: ActionKind.InstallPackage,
  retryable: true,
  async execute(step, { host, signal, timeoutMs }) {
    const { name, version, env, manager } = step.params;
    const result = await host.installPackage(
      { name, version, env, manager: packageManager(manager) },
      { signal, timeoutMs },
    );
    return { [resourceKey(step)]: result.version ?? UNPINNED_PACKAGE_VALUE };
  },
};

const createInterpreterEnv: ActionHandler = {
  kind: ActionKind.CreateInterpreterEnv,
  retryable: false,
  async execute(step, { host, signal, timeoutMs }) {
    const result = await host.createInterpreterEnv(
      { name: step.params.name, pythonVersion: step.params.pythonVersion },
      { signal, timeoutMs },
    );
    return { [resourceKey(step)]: result.pythonVersion };
  },
};

const mutatePathVariable: ActionHandler = {
  kind: ActionKind.MutatePathVariable,
  retryable: false,
  async execute(step, { snapshot, pathSeparator }) {
    const key = resourceKey(step);
    return { [key]: appendSegment(snapshot.get(key), step.params.segment, pathSeparator, step.params.after) };
  },
};

const fetchArtifact: ActionHandler = {
  kind: ActionKind.FetchArtifact,
  retryable: true,
  async execute(step, { host, signal, timeoutMs }) {
    const { url, destination, sha256 } = step.params;
    const result = await host.fetchArtifact({ url, destination, sha256 }, { signal, timeoutMs });
    return { [resourceKey(step)]: result.sha256 };
  },
};

const setPermission: ActionHandler = {
  kind: ActionKind.SetPermission,
  retryable: false,
  async execute(step, { host, signal, timeoutMs }) {
    const result = await host.setPermission({ path: step.params.path, mode: step.params.mode }, { signal, timeoutMs });
    return { [resourceKey(step)]: result.mode };
  },
};

/** Registry of handlers by kind. */
const actionHandlers = new Map<ActionKind, ActionHandler>(
  [installPackage, createInterpreterEnv, mutatePathVariable, fetchArtifact, setPermission].map((h) => [h.kind, h]),
);

/** Replace the handler for a kind. */
export function registerActionHandler(handler: ActionHandler): void {
  actionHandlers.set(handler.kind, handler);
}

export function getActionHandler(kind: ActionKind): ActionHandler | undefined {
  return actionHandlers.get(kind);
}
