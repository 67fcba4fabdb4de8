/**
 * Keyed mutual exclusion for population runs.
 *
 * `tryAcquire` checks and inserts in one synchronous step, so no other
 * task can interleave between the test and the insert. Guarantees at most
 * one concurrent run per canonical id, not exactly-once.
 */
export class InFlightPopulation {
  private active = new Set<string>();

  tryAcquire(canonicalId: string): boolean {
    if (this.active.has(canonicalId)) return false;
    this.active.add(canonicalId);
    return true;
  }

  release(canonicalId: string): void {
    this.active.delete(canonicalId);
  }

  has(canonicalId: string): boolean {
    return this.active.has(canonicalId);
  }

  get size(): number {
    return this.active.size;
  }

  /**
   * Run `fn` while holding the id. Returns `{ acquired: false }` without
   * calling `fn` when a run for the id is already in flight. The id is
   * released on every exit path.
   */
  async run<T>(canonicalId: string, fn: () => Promise<T>): Promise<{ acquired: true; value: T } | { acquired: false }> {
    if (!this.tryAcquire(canonicalId)) {
      return { acquired: false };
    }
    try {
      return { acquired: true, value: await fn() };
    } finally {
      this.release(canonicalId);
    }
  }
}
