/**
 * Environment snapshot.
 *
 * The authoritative record of provisioned resource state: resource key →
 * observed value, plus a revision counter that increments once per committed
 * step. Reads are open to everyone; the only write path is commit(), which
 * the executor calls after a step's postcondition has been confirmed.
 */

/** Serializable form of a snapshot. */
export interface SnapshotState {
  revision: number;
  resources: Record<string, string>;
}

/** Resource values produced by one step application. */
export type ResourceWrites = Record<string, string>;

export class Snapshot {
  private resources: Map<string, string>;
  private rev: number;

  constructor(state?: SnapshotState) {
    this.resources = new Map(Object.entries(state?.resources ?? {}));
    this.rev = state?.revision ?? 0;
  }

  static empty(): Snapshot {
    return new Snapshot();
  }

  get revision(): number {
    return this.rev;
  }

  get(key: string): string | undefined {
    return this.resources.get(key);
  }

  /**
   * A copy with the writes applied and the same revision. Used to evaluate a
   * postcondition against the would-be state before committing.
   */
  preview(writes: ResourceWrites): Snapshot {
    const next = this.clone();
    for (const [key, value] of Object.entries(writes)) {
      next.resources.set(key, value);
    }
    return next;
  }

  /** Merge writes and bump the revision. Returns the new revision. */
  commit(writes: ResourceWrites): number {
    for (const [key, value] of Object.entries(writes)) {
      this.resources.set(key, value);
    }
    this.rev += 1;
    return this.rev;
  }

  clone(): Snapshot {
    return new Snapshot(this.toJSON());
  }

  toJSON(): SnapshotState {
    return {
      revision: this.rev,
      resources: Object.fromEntries(this.resources),
    };
  }
}
