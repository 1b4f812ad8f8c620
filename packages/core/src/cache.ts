/**
 * Lazily computes a value once and shares the in-flight promise between
 * concurrent callers. A rejected load is forgotten so the next call retries.
 */
export class SingleFlight<T> {
  private pending: Promise<T> | undefined;

  constructor(private readonly load: () => Promise<T>) {}

  get(): Promise<T> {
    if (!this.pending) {
      const attempt = this.load();
      this.pending = attempt;
      attempt.catch(() => {
        if (this.pending === attempt) this.pending = undefined;
      });
    }
    return this.pending;
  }
}
