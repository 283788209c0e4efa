import type { Direction, Grid, Overlap, Pos } from "./types";
import { parseGrid } from "./parse";

export class Variable {
  readonly row: number;
  readonly col: number;
  readonly direction: Direction;
  readonly length: number;
  readonly key: string;

  constructor(row: number, col: number, direction: Direction, length: number) {
    this.row = row;
    this.col = col;
    this.direction = direction;
    this.length = length;
    this.key = `${row},${col},${direction},${length}`;
  }

  cells(): Pos[] {
    const out: Pos[] = [];
    for (let k = 0; k < this.length; k++) {
      out.push(
        this.direction === "across"
          ? { row: this.row, col: this.col + k }
          : { row: this.row + k, col: this.col },
      );
    }
    return out;
  }

  equals(other: Variable): boolean {
    return (
      this.row === other.row &&
      this.col === other.col &&
      this.direction === other.direction &&
      this.length === other.length
    );
  }

  toString(): string {
    return `(${this.row}, ${this.col}) ${this.direction} : ${this.length}`;
  }
}

function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

function pairKey(a: Variable, b: Variable): string {
  return `${a.key}|${b.key}`;
}

/**
 * Maximal runs of open cells of length >= 2.
 * Order: across slots row-major, then down slots column-major.
 */
export function deriveVariables(grid: Grid): Variable[] {
  const variables: Variable[] = [];

  for (let r = 0; r < grid.rows; r++) {
    let start = -1;
    for (let c = 0; c <= grid.cols; c++) {
      const open = c < grid.cols && grid.open[r][c];
      if (open && start < 0) start = c;
      if (!open && start >= 0) {
        if (c - start >= 2) variables.push(new Variable(r, start, "across", c - start));
        start = -1;
      }
    }
  }

  for (let c = 0; c < grid.cols; c++) {
    let start = -1;
    for (let r = 0; r <= grid.rows; r++) {
      const open = r < grid.rows && grid.open[r][c];
      if (open && start < 0) start = r;
      if (!open && start >= 0) {
        if (r - start >= 2) variables.push(new Variable(start, c, "down", r - start));
        start = -1;
      }
    }
  }

  return variables;
}

/**
 * Overlaps for every pair sharing exactly one cell, stored under both
 * orderings. Pairs sharing no cell are absent.
 */
export function computeOverlaps(variables: readonly Variable[]): Map<string, Overlap> {
  const overlaps = new Map<string, Overlap>();
  const indexMaps = variables.map((v) => {
    const m = new Map<string, number>();
    v.cells().forEach((p, k) => m.set(posKey(p), k));
    return m;
  });

  for (let a = 0; a < variables.length; a++) {
    for (let b = a + 1; b < variables.length; b++) {
      const shared: Overlap[] = [];
      for (const [key, i] of indexMaps[a]) {
        const j = indexMaps[b].get(key);
        if (j !== undefined) shared.push({ i, j });
      }
      if (shared.length !== 1) continue;
      const { i, j } = shared[0];
      overlaps.set(pairKey(variables[a], variables[b]), { i, j });
      overlaps.set(pairKey(variables[b], variables[a]), { i: j, j: i });
    }
  }

  return overlaps;
}

export class Puzzle {
  readonly grid: Grid;
  readonly rows: number;
  readonly cols: number;
  readonly variables: readonly Variable[];
  private readonly overlaps: Map<string, Overlap>;
  private readonly byKey = new Map<string, Variable>();
  private readonly neighbourLists = new Map<string, Variable[]>();

  constructor(grid: Grid) {
    this.grid = grid;
    this.rows = grid.rows;
    this.cols = grid.cols;
    this.variables = deriveVariables(grid);
    this.overlaps = computeOverlaps(this.variables);

    for (const v of this.variables) this.byKey.set(v.key, v);
    for (const v of this.variables) {
      this.neighbourLists.set(
        v.key,
        this.variables.filter((o) => o !== v && this.overlaps.has(pairKey(v, o))),
      );
    }
  }

  static fromText(text: string): Puzzle {
    return new Puzzle(parseGrid(text));
  }

  // The puzzle's own instance for a structurally equal variable
  resolve(v: Variable): Variable | undefined {
    return this.byKey.get(v.key);
  }

  overlap(a: Variable, b: Variable): Overlap | null {
    return this.overlaps.get(pairKey(a, b)) ?? null;
  }

  neighbors(v: Variable): readonly Variable[] {
    return this.neighbourLists.get(v.key) ?? [];
  }

  degree(v: Variable): number {
    return this.neighbors(v).length;
  }
}
