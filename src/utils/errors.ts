// Contract violations. Nothing in the solvers catches these.

export class GridRangeError extends RangeError {
  constructor(row: number, col: number, rows: number, columns: number) {
    super(`Cell (${row},${col}) is outside a ${rows}x${columns} grid.`);
    this.name = "GridRangeError";
  }
}

export class GridShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GridShapeError";
  }
}

export class GridParseError extends Error {
  constructor(line: number, column: number, found: string) {
    super(`Unknown cell '${found}' at line ${line}, column ${column}.`);
    this.name = "GridParseError";
  }
}

export class InvalidStepError extends Error {
  constructor(direction: string, row: number, col: number) {
    super(`Cannot step ${direction} from (${row},${col}).`);
    this.name = "InvalidStepError";
  }
}

export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}
