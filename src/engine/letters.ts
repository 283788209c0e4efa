import type { Puzzle } from "./puzzle";
import type { Assignment } from "./assignment";

export const BLOCK_GLYPH = "█";

export function letterGrid(
  puzzle: Puzzle,
  assignment: Assignment,
): (string | null)[][] {
  const letters: (string | null)[][] = [];
  for (let r = 0; r < puzzle.rows; r++) {
    letters.push(new Array<string | null>(puzzle.cols).fill(null));
  }

  for (const [variable, word] of assignment) {
    variable.cells().forEach((p, k) => {
      if (k < word.length) letters[p.row][p.col] = word[k];
    });
  }
  return letters;
}

// One line per grid row; blank for unfilled open cells
export function formatAssignment(
  puzzle: Puzzle,
  assignment: Assignment,
): string {
  const letters = letterGrid(puzzle, assignment);
  const lines: string[] = [];
  for (let r = 0; r < puzzle.rows; r++) {
    let line = "";
    for (let c = 0; c < puzzle.cols; c++) {
      line += puzzle.grid.open[r][c] ? (letters[r][c] ?? " ") : BLOCK_GLYPH;
    }
    lines.push(line);
  }
  return lines.join("\n");
}
