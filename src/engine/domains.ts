import type { Variable } from "./puzzle";

interface Removal {
  key: string;
  word: string;
}

/**
 * Candidate words per variable. Every removal is recorded on a trail so a
 * search branch can be rolled back with `undo(mark)`.
 */
export class Domains {
  private readonly sets = new Map<string, Set<string>>();
  private readonly trail: Removal[] = [];

  constructor(variables: readonly Variable[], words: readonly string[]) {
    for (const v of variables) this.sets.set(v.key, new Set(words));
  }

  get(v: Variable): ReadonlySet<string> {
    return this.sets.get(v.key) ?? new Set<string>();
  }

  size(v: Variable): number {
    return this.sets.get(v.key)?.size ?? 0;
  }

  has(v: Variable, word: string): boolean {
    return this.sets.get(v.key)?.has(word) ?? false;
  }

  remove(v: Variable, word: string): boolean {
    const set = this.sets.get(v.key);
    if (!set || !set.delete(word)) return false;
    this.trail.push({ key: v.key, word });
    return true;
  }

  // Remove every word matching `predicate`; returns the number removed
  removeWhere(v: Variable, predicate: (word: string) => boolean): number {
    const set = this.sets.get(v.key);
    if (!set) return 0;
    let removed = 0;
    for (const word of Array.from(set)) {
      if (predicate(word)) {
        set.delete(word);
        this.trail.push({ key: v.key, word });
        removed++;
      }
    }
    return removed;
  }

  mark(): number {
    return this.trail.length;
  }

  undo(mark: number): void {
    while (this.trail.length > mark) {
      const entry = this.trail.pop();
      if (!entry) break;
      this.sets.get(entry.key)?.add(entry.word);
    }
  }

  snapshot(): Map<string, string[]> {
    const out = new Map<string, string[]>();
    for (const [key, set] of this.sets) out.set(key, Array.from(set).sort());
    return out;
  }
}
