/**
 * Load-once resource with single-flight initialization.
 *
 * Concurrent first calls share one in-flight load. A failed load is not
 * cached, so the next call tries again. `clear()` drops the value and the
 * next `get()` loads it afresh.
 */
export class LazyResource<T> {
  private value: T | undefined;
  private loaded = false;
  private pending: Promise<T> | null = null;
  /** Bumped by clear() so a load started before it cannot repopulate */
  private generation = 0;

  constructor(private readonly loader: () => Promise<T>) {}

  get isLoaded(): boolean {
    return this.loaded;
  }

  async get(): Promise<T> {
    if (this.loaded && this.value !== undefined) {
      return this.value;
    }
    if (this.pending) {
      return this.pending;
    }

    const generation = this.generation;
    const load = this.loader().then(
      (value) => {
        if (generation === this.generation) {
          this.value = value;
          this.loaded = true;
          this.pending = null;
        }
        return value;
      },
      (error: unknown) => {
        if (generation === this.generation) {
          this.pending = null;
        }
        throw error;
      }
    );
    this.pending = load;
    return load;
  }

  clear(): void {
    this.generation++;
    this.value = undefined;
    this.loaded = false;
    this.pending = null;
  }
}
