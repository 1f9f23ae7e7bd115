/**
 * Insertion-ordered promise cache that evicts its oldest entry past `limit`.
 * Keeps repeated metadata reads of the same file to one underlying call.
 */
export class PromiseCache<T> {
  private entries = new Map<string, Promise<T>>();

  constructor(private readonly limit: number = 64) {}

  get(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }
    const pending = load();
    this.entries.set(key, pending);
    if (this.entries.size > this.limit) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
      }
    }
    return pending;
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
