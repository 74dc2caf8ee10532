// server/src/services/seasonCache.ts

/**
 * Explicit season-keyed memo store. Concurrent callers asking for the same
 * season share one in-flight load; a failed load is dropped so the next call retries.
 */
export class SeasonCache<T> {
  private readonly values = new Map<string, T>();
  private readonly pending = new Map<string, Promise<T>>();

  get(season: string): T | undefined {
    return this.values.get(season);
  }

  has(season: string): boolean {
    return this.values.has(season);
  }

  set(season: string, value: T): void {
    this.values.set(season, value);
  }

  delete(season: string): boolean {
    this.pending.delete(season);
    return this.values.delete(season);
  }

  clear(): void {
    this.values.clear();
    this.pending.clear();
  }

  get size(): number {
    return this.values.size;
  }

  async getOrCompute(season: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.values.get(season);
    if (cached !== undefined) return cached;

    const inFlight = this.pending.get(season);
    if (inFlight) return inFlight;

    const load = loader()
      .then(value => {
        if (this.pending.get(season) === load) {
          this.values.set(season, value);
        }
        return value;
      })
      .finally(() => {
        if (this.pending.get(season) === load) {
          this.pending.delete(season);
        }
      });

    this.pending.set(season, load);
    return load;
  }
}
