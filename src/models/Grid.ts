import type { CellKind } from "../types/types";
import { GridRangeError, GridShapeError } from "../utils/errors";
import { idOf } from "../utils/utils";

// 0 empty, 1 crane, 2 building
const KIND_CODES: Record<CellKind, number> = {
  Empty: 0,
  Crane: 1,
  Building: 2,
};
const CODE_KINDS: readonly CellKind[] = ["Empty", "Crane", "Building"];

// Immutable grid, row-major. A non-empty grid never has a building at (0,0).
export class Grid {
  private readonly cells: Uint8Array;

  constructor(
    private readonly nRows: number,
    private readonly nColumns: number,
    kinds: readonly CellKind[] = []
  ) {
    if (
      !Number.isInteger(nRows) ||
      !Number.isInteger(nColumns) ||
      nRows < 0 ||
      nColumns < 0
    ) {
      throw new GridShapeError(`Invalid grid size ${nRows}x${nColumns}.`);
    }
    const size = nRows * nColumns;
    if (kinds.length !== 0 && kinds.length !== size) {
      throw new GridShapeError(
        `Expected ${size} cells for a ${nRows}x${nColumns} grid, got ${kinds.length}.`
      );
    }
    this.cells = new Uint8Array(size); // all empty unless given
    kinds.forEach((k, i) => {
      this.cells[i] = KIND_CODES[k];
    });
    if (size > 0 && this.cells[0] === KIND_CODES.Building) {
      throw new GridShapeError("The start cell (0,0) cannot be a building.");
    }
  }

  static fromRows(rows: readonly (readonly CellKind[])[]): Grid {
    const nColumns = rows.length ? rows[0].length : 0;
    rows.forEach((row, r) => {
      if (row.length !== nColumns) {
        throw new GridShapeError(
          `Row ${r} has ${row.length} cells, expected ${nColumns}.`
        );
      }
    });
    return new Grid(rows.length, nColumns, rows.flat());
  }

  rows() {
    return this.nRows;
  }

  columns() {
    return this.nColumns;
  }

  isEmpty() {
    return this.nRows === 0 || this.nColumns === 0;
  }

  inBounds(row: number, col: number) {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.nRows &&
      col >= 0 &&
      col < this.nColumns
    );
  }

  get(row: number, col: number): CellKind {
    if (!this.inBounds(row, col)) {
      throw new GridRangeError(row, col, this.nRows, this.nColumns);
    }
    return CODE_KINDS[this.cells[idOf(this.nColumns, row, col)]];
  }

  craneCount() {
    let count = 0;
    for (const code of this.cells) if (code === KIND_CODES.Crane) count++;
    return count;
  }
}
