export { Puzzle, Variable, deriveVariables, computeOverlaps } from "./puzzle";
export { createGrid, parseGrid, parseWords } from "./parse";
export { MalformedGridError } from "./errors";
export { Domains } from "./domains";
export { CrosswordSolver, solve } from "./solver";
export { Assignment } from "./assignment";
export type { Arc } from "./solver";
export { letterGrid, formatAssignment, BLOCK_GLYPH } from "./letters";
export type {
  Direction,
  Grid,
  Overlap,
  Pos,
  SolverConfig,
  SolveResult,
} from "./types";
export { SolveStatus, DEFAULT_CONFIG, OPEN_CELL, BLOCKED_CELL } from "./types";
