/**
 * Ordered string map with case-insensitive keys.
 * The first spelling of a key is the one kept for output.
 */
export class PairMap implements Iterable<[string, string]> {
  private readonly entries = new Map<string, [string, string]>();

  constructor(pairs?: Iterable<readonly [string, string]>) {
    if (pairs) {
      for (const [key, value] of pairs) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): string | undefined {
    return this.entries.get(key.toLowerCase())?.[1];
  }

  has(key: string): boolean {
    return this.entries.has(key.toLowerCase());
  }

  /**
   * Insert unless the key is already present
   * @returns false when an earlier entry won
   */
  add(key: string, value: string): boolean {
    const normalized = key.toLowerCase();
    if (this.entries.has(normalized)) {
      return false;
    }
    this.entries.set(normalized, [key, value]);
    return true;
  }

  /**
   * Insert or overwrite
   */
  set(key: string, value: string): void {
    const normalized = key.toLowerCase();
    const existing = this.entries.get(normalized);
    this.entries.set(normalized, [existing ? existing[0] : key, value]);
  }

  delete(key: string): boolean {
    return this.entries.delete(key.toLowerCase());
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const [key, value] of this.entries.values()) {
      yield [key, value];
    }
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this);
  }
}
