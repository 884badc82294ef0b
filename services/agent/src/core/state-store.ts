import type { LifecycleSnapshot } from "@satchel/schemas";

/**
 * Durable home of the lifecycle aggregate. Calls are synchronous so a save
 * always completes on the scheduler's own turn.
 */
export interface IStateStore {
  load(): LifecycleSnapshot | null;
  /** Replaces everything previously saved. */
  save(snapshot: LifecycleSnapshot): void;
}

/**
 * In-memory state store (for development/testing).
 */
export class InMemoryStateStore implements IStateStore {
  private snapshot: LifecycleSnapshot | null;
  private saves = 0;
  private failure: Error | null = null;

  constructor(initial: LifecycleSnapshot | null = null) {
    this.snapshot = initial ? structuredClone(initial) : null;
  }

  load(): LifecycleSnapshot | null {
    return this.snapshot ? structuredClone(this.snapshot) : null;
  }

  save(snapshot: LifecycleSnapshot): void {
    if (this.failure) {
      throw this.failure;
    }
    this.saves += 1;
    this.snapshot = structuredClone(snapshot);
  }

  /** Makes every following save throw `error` (null to recover). */
  failSaves(error: Error | null): void {
    this.failure = error;
  }

  getSaveCount(): number {
    return this.saves;
  }
}
