import type { Cell, StepDirection } from "../types/types";
import { InvalidStepError } from "../utils/errors";
import type { Grid } from "./Grid";

const DELTAS: Record<StepDirection, Cell> = {
  East: { r: 0, c: 1 },
  South: { r: 1, c: 0 },
};

// East/South walk from (0,0). Moves only raise r + c, so each crane counts once.
export class Path {
  private moves: StepDirection[] = [];
  private row = 0;
  private col = 0;
  private cranes: number;

  constructor(private readonly setting: Grid) {
    this.cranes =
      !setting.isEmpty() && setting.get(0, 0) === "Crane" ? 1 : 0;
  }

  grid() {
    return this.setting;
  }

  isStepValid(direction: StepDirection) {
    const { r, c } = DELTAS[direction];
    const nr = this.row + r,
      nc = this.col + c;
    return (
      this.setting.inBounds(nr, nc) && this.setting.get(nr, nc) !== "Building"
    );
  }

  addStep(direction: StepDirection) {
    if (!this.isStepValid(direction)) {
      throw new InvalidStepError(direction, this.row, this.col);
    }
    const { r, c } = DELTAS[direction];
    this.row += r;
    this.col += c;
    this.moves.push(direction);
    if (this.setting.get(this.row, this.col) === "Crane") this.cranes++;
  }

  totalCranes() {
    return this.cranes;
  }

  steps(): readonly StepDirection[] {
    return this.moves;
  }

  stepCount() {
    return this.moves.length;
  }

  finalRow() {
    return this.row;
  }

  finalColumn() {
    return this.col;
  }

  // Visited coordinates, start cell first
  cells(): Cell[] {
    const out: Cell[] = [{ r: 0, c: 0 }];
    let r = 0,
      c = 0;
    for (const m of this.moves) {
      r += DELTAS[m].r;
      c += DELTAS[m].c;
      out.push({ r, c });
    }
    return out;
  }

  clone(): Path {
    const copy = new Path(this.setting);
    copy.moves = this.moves.slice();
    copy.row = this.row;
    copy.col = this.col;
    copy.cranes = this.cranes;
    return copy;
  }
}
