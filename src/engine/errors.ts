export class MalformedGridError extends Error {
  readonly row: number | null;
  readonly col: number | null;

  constructor(message: string, row: number | null = null, col: number | null = null) {
    super(message);
    this.name = "MalformedGridError";
    this.row = row;
    this.col = col;
  }
}
