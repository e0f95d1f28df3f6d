/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Records are copied
 * on the way in and out so callers never share nested arrays or objects with
 * the store.
 */

import { ProvisioningRun } from '../domain/run';
import { ListOptions, ListResult, RunStore, Store, toListResult } from './store';

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, ProvisioningRun>();

  async create(run: ProvisioningRun): Promise<ProvisioningRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<ProvisioningRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<ProvisioningRun>): Promise<ProvisioningRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), id };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<ListResult<ProvisioningRun>> {
    // Later inserts first on equal start times.
    const all = [...this.data.values()].reverse().sort((a, b) => b.startedAt.localeCompare(a.startedAt));
    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? 100;
    return toListResult(all.slice(offset, offset + limit).map(deepCopy), all.length, options);
  }
}

/** Create a complete in-memory store. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
  };
}
