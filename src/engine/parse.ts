import { BLOCKED_CELL, OPEN_CELL } from "./types";
import type { Grid } from "./types";
import { MalformedGridError } from "./errors";

export function createGrid(open: boolean[][]): Grid {
  const rows = open.length;
  const cols = rows > 0 ? open[0].length : 0;
  for (let r = 1; r < rows; r++) {
    if (open[r].length !== cols) {
      throw new MalformedGridError(
        `Row ${r} has width ${open[r].length}, expected ${cols}.`,
        r,
      );
    }
  }
  return { rows, cols, open: open.map((row) => [...row]) };
}

export function parseGrid(text: string): Grid {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  const open: boolean[][] = [];
  for (let r = 0; r < lines.length; r++) {
    const row: boolean[] = [];
    const line = lines[r];
    for (let c = 0; c < line.length; c++) {
      const ch = line[c];
      if (ch === OPEN_CELL) row.push(true);
      else if (ch === BLOCKED_CELL) row.push(false);
      else {
        throw new MalformedGridError(
          `Unexpected character "${ch}" at (${r}, ${c}).`,
          r,
          c,
        );
      }
    }
    open.push(row);
  }
  return createGrid(open);
}

// Whitespace-delimited, case-normalized, first occurrence wins
export function parseWords(text: string): string[] {
  const seen = new Set<string>();
  for (const token of text.split(/\s+/)) {
    if (token === "") continue;
    seen.add(token.toUpperCase());
  }
  return Array.from(seen);
}
