import type { Assignment } from "./assignment";

export type Direction = "across" | "down";

export interface Pos {
  row: number;
  col: number;
}

// Immutable cell layout; true = open (fillable), false = blocked
export interface Grid {
  readonly rows: number;
  readonly cols: number;
  readonly open: ReadonlyArray<ReadonlyArray<boolean>>;
}

// Index of the shared cell within the first and the second variable
export interface Overlap {
  i: number;
  j: number;
}

export interface SolverConfig {
  maxSearchNodes: number;
  timeLimitMs: number | null; // null = no wall-clock limit
  arcConsistency: boolean;    // full AC-3 pass before search
  now: () => number;
}

export enum SolveStatus {
  Solved = "solved",
  NoSolution = "no-solution",
  Aborted = "aborted",
}

export interface SolveResult {
  status: SolveStatus;
  assignment: Assignment | null;
  reason?: string;
  nodes: number;
}

export const OPEN_CELL = "_";
export const BLOCKED_CELL = "#";

/** Default config */
export const DEFAULT_CONFIG: SolverConfig = {
  maxSearchNodes: 5_000_000,
  timeLimitMs: null,
  arcConsistency: true,
  now: Date.now,
};
