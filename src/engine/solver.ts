import { DEFAULT_CONFIG, SolveStatus } from "./types";
import type { SolveResult, SolverConfig } from "./types";
import type { Puzzle, Variable } from "./puzzle";
import { Domains } from "./domains";
import { Assignment } from "./assignment";

export type Arc = [Variable, Variable];

function normalizeWords(words: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const w of words) {
    const word = w.trim().toUpperCase();
    if (word !== "") seen.add(word);
  }
  return Array.from(seen);
}

function compareWords(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function assignedKeys(assignment: Assignment): Set<string> {
  return new Set(assignment.keys().map((v) => v.key));
}

export class CrosswordSolver {
  readonly puzzle: Puzzle;
  readonly words: readonly string[];
  readonly domains: Domains;
  readonly config: SolverConfig;
  private nodes = 0;
  private deadline: number | null = null;
  private abortReason: string | null = null;

  constructor(puzzle: Puzzle, words: Iterable<string>, config: Partial<SolverConfig> = {}) {
    this.puzzle = puzzle;
    this.words = normalizeWords(words);
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.domains = new Domains(puzzle.variables, this.words);
  }

  // Unary constraint: word length must match slot length
  enforceNodeConsistency(): boolean {
    let ok = true;
    for (const v of this.puzzle.variables) {
      this.domains.removeWhere(v, (word) => word.length !== v.length);
      if (this.domains.size(v) === 0) ok = false;
    }
    return ok;
  }

  /**
   * Make `x` arc-consistent with `y`: drop every word of x whose letter at
   * the shared cell has no match in y's domain. Returns true if x changed.
   */
  revise(x: Variable, y: Variable): boolean {
    const overlap = this.puzzle.overlap(x, y);
    if (overlap === null) return false;

    const letters = new Set<string>();
    for (const word of this.domains.get(y)) letters.add(word[overlap.j]);
    return this.domains.removeWhere(x, (word) => !letters.has(word[overlap.i])) > 0;
  }

  /**
   * AC-3 over `arcs`, or over every directed arc when omitted.
   * Returns false as soon as a domain is wiped out.
   */
  ac3(arcs?: readonly Arc[]): boolean {
    const queue: Arc[] = arcs ? [...arcs] : this.allArcs();
    let head = 0;

    while (head < queue.length) {
      const [x, y] = queue[head++];
      if (!this.revise(x, y)) continue;
      if (this.domains.size(x) === 0) return false;
      for (const k of this.puzzle.neighbors(x)) {
        if (!k.equals(y)) queue.push([k, x]);
      }
    }
    return true;
  }

  assignmentComplete(assignment: Assignment): boolean {
    const keys = assignedKeys(assignment);
    return this.puzzle.variables.every((v) => keys.has(v.key));
  }

  consistent(assignment: Assignment): boolean {
    const used = new Set<string>();
    const byKey = new Map<string, string>();
    for (const [v, word] of assignment) {
      if (word.length !== v.length) return false;
      if (used.has(word)) return false;
      used.add(word);
      byKey.set(v.key, word);
    }

    for (const [v, word] of assignment) {
      for (const n of this.puzzle.neighbors(v)) {
        const other = byKey.get(n.key);
        if (other === undefined) continue;
        const overlap = this.puzzle.overlap(v, n);
        if (overlap && word[overlap.i] !== other[overlap.j]) return false;
      }
    }
    return true;
  }

  // Minimum remaining values, then highest degree, then enumeration order
  selectUnassignedVariable(assignment: Assignment): Variable | null {
    const keys = assignedKeys(assignment);
    let best: Variable | null = null;
    let bestSize = Number.POSITIVE_INFINITY;
    let bestDegree = -1;

    for (const v of this.puzzle.variables) {
      if (keys.has(v.key)) continue;
      const size = this.domains.size(v);
      const degree = this.puzzle.degree(v);
      if (size < bestSize || (size === bestSize && degree > bestDegree)) {
        best = v;
        bestSize = size;
        bestDegree = degree;
      }
    }
    return best;
  }

  // Least constraining value first; ties alphabetical
  orderDomainValues(v: Variable, assignment: Assignment): string[] {
    const keys = assignedKeys(assignment);
    const open = this.puzzle.neighbors(v).filter((n) => !keys.has(n.key));

    const ruledOut = new Map<string, number>();
    for (const value of this.domains.get(v)) {
      let count = 0;
      for (const n of open) {
        const overlap = this.puzzle.overlap(v, n);
        if (overlap === null) continue;
        for (const word of this.domains.get(n)) {
          if (value[overlap.i] !== word[overlap.j]) count++;
        }
      }
      ruledOut.set(value, count);
    }

    return Array.from(ruledOut.keys()).sort(
      (a, b) => (ruledOut.get(a) ?? 0) - (ruledOut.get(b) ?? 0) || compareWords(a, b),
    );
  }

  // Searches from a copy; the argument is left untouched
  backtrack(assignment: Assignment): Assignment | null {
    return this.search(assignment.clone());
  }

  private search(assignment: Assignment): Assignment | null {
    if (this.abortReason !== null) return null;
    this.nodes++;
    if (this.nodes > this.config.maxSearchNodes) {
      this.abortReason = `Search node limit of ${this.config.maxSearchNodes} reached.`;
      return null;
    }
    if (this.deadline !== null && this.config.now() > this.deadline) {
      this.abortReason = `Time limit of ${this.config.timeLimitMs} ms reached.`;
      return null;
    }

    if (this.assignmentComplete(assignment)) return assignment.clone();

    const v = this.selectUnassignedVariable(assignment);
    if (v === null) return null;

    for (const value of this.orderDomainValues(v, assignment)) {
      assignment.set(v, value);
      if (this.consistent(assignment)) {
        const mark = this.domains.mark();
        if (this.infer(v, value, assignment)) {
          const result = this.search(assignment);
          if (result !== null) return result;
        }
        this.domains.undo(mark);
      }
      assignment.delete(v);
      if (this.abortReason !== null) return null;
    }
    return null;
  }

  solve(): SolveResult {
    this.nodes = 0;
    this.abortReason = null;
    const start = this.domains.mark();
    const { timeLimitMs } = this.config;
    this.deadline = timeLimitMs === null ? null : this.config.now() + timeLimitMs;

    if (!this.enforceNodeConsistency()) {
      const empty = this.puzzle.variables.find((v) => this.domains.size(v) === 0);
      this.domains.undo(start);
      return {
        status: SolveStatus.NoSolution,
        assignment: null,
        reason: empty
          ? `No word of length ${empty.length} for slot ${empty.toString()}.`
          : "A slot has no candidate words.",
        nodes: 0,
      };
    }

    if (this.config.arcConsistency && !this.ac3()) {
      this.domains.undo(start);
      return {
        status: SolveStatus.NoSolution,
        assignment: null,
        reason: "Arc consistency emptied a domain.",
        nodes: 0,
      };
    }

    const assignment = this.search(new Assignment());
    if (assignment !== null) {
      return { status: SolveStatus.Solved, assignment, nodes: this.nodes };
    }

    this.domains.undo(start);
    if (this.abortReason !== null) {
      console.warn(`Search stopped after ${this.nodes} nodes: ${this.abortReason}`);
      return {
        status: SolveStatus.Aborted,
        assignment: null,
        reason: this.abortReason,
        nodes: this.nodes,
      };
    }
    return {
      status: SolveStatus.NoSolution,
      assignment: null,
      reason: "Search exhausted every candidate.",
      nodes: this.nodes,
    };
  }

  // Fix v to value, drop value from other open slots, then re-run AC-3 on arcs into v
  private infer(v: Variable, value: string, assignment: Assignment): boolean {
    this.domains.removeWhere(v, (word) => word !== value);

    const keys = assignedKeys(assignment);
    for (const u of this.puzzle.variables) {
      if (keys.has(u.key) || u.length !== value.length) continue;
      this.domains.remove(u, value);
      if (this.domains.size(u) === 0) return false;
    }

    const arcs: Arc[] = this.puzzle
      .neighbors(v)
      .filter((k) => !keys.has(k.key))
      .map((k): Arc => [k, v]);
    return this.ac3(arcs);
  }

  private allArcs(): Arc[] {
    const arcs: Arc[] = [];
    for (const x of this.puzzle.variables) {
      for (const y of this.puzzle.neighbors(x)) arcs.push([x, y]);
    }
    return arcs;
  }
}

export function solve(
  puzzle: Puzzle,
  words: Iterable<string>,
  config: Partial<SolverConfig> = {},
): SolveResult {
  return new CrosswordSolver(puzzle, words, config).solve();
}
