/**
 * Session Cell
 *
 * Owns the current client for an external service. Readers take a snapshot
 * with `current()`; re-authentication builds a complete replacement and
 * installs it with one assignment, so an in-flight call keeps using the
 * snapshot it started with and never sees a half-built client.
 *
 * Concurrent `refresh` calls share the single in-flight rebuild.
 */

export interface SessionSnapshot<T> {
  value: T;
  generation: number;
}

export class SessionCell<T> {
  private snapshot: SessionSnapshot<T>;
  private pending: Promise<SessionSnapshot<T>> | null = null;

  constructor(initial: T) {
    this.snapshot = { value: initial, generation: 0 };
  }

  current(): T {
    return this.snapshot.value;
  }

  get generation(): number {
    return this.snapshot.generation;
  }

  replace(value: T): SessionSnapshot<T> {
    this.snapshot = { value, generation: this.snapshot.generation + 1 };
    return this.snapshot;
  }

  /**
   * Rebuild the value with `build` unless a rebuild is already running
   */
  refresh(build: (stale: T) => Promise<T>): Promise<SessionSnapshot<T>> {
    if (this.pending) {
      return this.pending;
    }

    const stale = this.snapshot.value;
    this.pending = build(stale)
      .then((value) => this.replace(value))
      .finally(() => {
        this.pending = null;
      });
    return this.pending;
  }
}
