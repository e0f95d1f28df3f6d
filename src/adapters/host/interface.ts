/**
 * Provisioning host interface.
 *
 * The side-effecting half of every action. Hosts report the value they
 * observed after the operation; the engine turns it into a resource write and
 * checks the step's postcondition against it.
 *
 * Hosts signal failures with TransientActionError (retried for network and
 * filesystem kinds) or NonTransientActionError (fatal).
 */

import { PackageManager } from '../../dsl/schema';

export interface HostCallContext {
  /** Aborted when the attempt times out or the run is canceled. */
  signal: AbortSignal;
  timeoutMs: number;
}

export interface InstallPackageRequest {
  name: string;
  version?: string;
  manager: PackageManager;
  env?: string;
}

export interface CreateInterpreterEnvRequest {
  name: string;
  pythonVersion: string;
}

export interface FetchArtifactRequest {
  url: string;
  destination: string;
  sha256?: string;
}

export interface SetPermissionRequest {
  path: string;
  mode: string;
}

export interface ProvisioningHost {
  /** Resolves with the installed version, or undefined when unknown. */
  installPackage(request: InstallPackageRequest, ctx: HostCallContext): Promise<{ version?: string }>;
  createInterpreterEnv(request: CreateInterpreterEnvRequest, ctx: HostCallContext): Promise<{ pythonVersion: string }>;
  /** Resolves with the SHA-256 of the stored artifact. */
  fetchArtifact(request: FetchArtifactRequest, ctx: HostCallContext): Promise<{ sha256: string }>;
  /** Resolves with the mode read back after applying it. */
  setPermission(request: SetPermissionRequest, ctx: HostCallContext): Promise<{ mode: string }>;
}
