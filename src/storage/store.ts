/**
 * Storage layer interfaces.
 *
 * Defines the contract for run persistence with pluggable backends.
 */

import { ProvisioningRun } from '../domain/run';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Store interface for provisioning runs. */
export interface RunStore {
  create(run: ProvisioningRun): Promise<ProvisioningRun>;
  getById(id: string): Promise<ProvisioningRun | null>;
  update(id: string, run: Partial<ProvisioningRun>): Promise<ProvisioningRun | null>;
  /** Most recent first. */
  list(options?: ListOptions): Promise<ListResult<ProvisioningRun>>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  runs: RunStore;
}
