/**
 * A set of string keys that forgets everything once `ttlMs` has passed
 * since the window opened. Reaching `maxSize` also starts a new window.
 */
export default class TTLSet {
  private keys = new Set<string>();
  private windowStart: number;

  constructor(
    private readonly ttlMs: number,
    private readonly maxSize: number = Number.POSITIVE_INFINITY,
  ) {
    this.windowStart = Date.now();
  }

  has(key: string): boolean {
    this.expire();
    return this.keys.has(key);
  }

  /**
   * Returns true when `key` was not yet in the current window.
   */
  add(key: string): boolean {
    this.expire();
    if (this.keys.has(key)) {
      return false;
    }
    if (this.keys.size >= this.maxSize) {
      this.keys.clear();
    }
    this.keys.add(key);
    return true;
  }

  get size(): number {
    this.expire();
    return this.keys.size;
  }

  clear(): void {
    this.keys.clear();
    this.windowStart = Date.now();
  }

  private expire(): void {
    const now = Date.now();
    if (now - this.windowStart >= this.ttlMs) {
      this.keys.clear();
      this.windowStart = now;
    }
  }
}
