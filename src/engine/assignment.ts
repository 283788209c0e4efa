import type { Variable } from "./puzzle";

/**
 * Slot -> word mapping keyed by `Variable.key`, so any structurally equal
 * variable reads and writes the same entry.
 */
export class Assignment {
  private readonly entries = new Map<string, [Variable, string]>();

  constructor(init: Iterable<readonly [Variable, string]> = []) {
    for (const [v, word] of init) this.set(v, word);
  }

  get size(): number {
    return this.entries.size;
  }

  get(v: Variable): string | undefined {
    return this.entries.get(v.key)?.[1];
  }

  has(v: Variable): boolean {
    return this.entries.has(v.key);
  }

  // Replaces the word of a structurally equal variable already present
  set(v: Variable, word: string): this {
    const existing = this.entries.get(v.key);
    this.entries.set(v.key, [existing ? existing[0] : v, word]);
    return this;
  }

  delete(v: Variable): boolean {
    return this.entries.delete(v.key);
  }

  keys(): Variable[] {
    return Array.from(this.entries.values(), ([v]) => v);
  }

  values(): string[] {
    return Array.from(this.entries.values(), ([, word]) => word);
  }

  clone(): Assignment {
    return new Assignment(this);
  }

  *[Symbol.iterator](): IterableIterator<[Variable, string]> {
    for (const [v, word] of this.entries.values()) yield [v, word];
  }
}
