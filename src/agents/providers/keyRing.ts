/**
 * Ring of credentials for one provider. Every method is synchronous, so pick,
 * advance and mark never interleave with another caller on the event loop.
 */
export class KeyRing {
  private index = 0;
  private readonly exhausted = new Set<string>();

  constructor(private readonly keys: readonly string[]) {}

  /** Current non-exhausted key, or null when the whole ring is spent. */
  current(): string | null {
    for (let offset = 0; offset < this.keys.length; offset += 1) {
      const position = (this.index + offset) % this.keys.length;
      const key = this.keys[position];
      if (!this.exhausted.has(key)) {
        this.index = position;
        return key;
      }
    }
    return null;
  }

  advance(): void {
    if (this.keys.length > 0) {
      this.index = (this.index + 1) % this.keys.length;
    }
  }

  markExhausted(key: string): void {
    this.exhausted.add(key);
  }

  exhaustedKeys(): string[] {
    return [...this.exhausted];
  }
}
