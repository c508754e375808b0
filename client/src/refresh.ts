import type { Clock } from './api';

interface Snapshot<T> {
  value: T;
  fetchedAt: number;
}

/**
 * A cached value that is fetched again on access once it is `intervalMs` old.
 * Nothing runs in the background; staleness is checked when the value is read.
 */
export class RefreshingValue<T> {
  private snapshot: Snapshot<T> | undefined;
  private pending: Promise<T> | undefined;

  constructor(
    private readonly fetcher: () => Promise<T>,
    private readonly clock: Clock,
    private readonly intervalMs: number,
    initial?: T
  ) {
    if (initial !== undefined) {
      this.snapshot = { value: initial, fetchedAt: clock() };
    }
  }

  /** Last fetched value, without any network access. */
  get cached(): T | undefined {
    return this.snapshot?.value;
  }

  get fetchedAt(): number | undefined {
    return this.snapshot?.fetchedAt;
  }

  isStale(): boolean {
    return this.snapshot === undefined || this.clock() - this.snapshot.fetchedAt >= this.intervalMs;
  }

  async get(): Promise<T> {
    if (this.snapshot !== undefined && !this.isStale()) {
      return this.snapshot.value;
    }
    return this.refresh();
  }

  /**
   * Fetch unconditionally. Callers arriving while a fetch is in flight share it.
   * On failure the previous snapshot is kept.
   */
  refresh(): Promise<T> {
    this.pending ??= this.fetch().finally(() => {
      this.pending = undefined;
    });
    return this.pending;
  }

  private async fetch(): Promise<T> {
    const value = await this.fetcher();
    this.snapshot = { value, fetchedAt: this.clock() };
    return value;
  }
}
