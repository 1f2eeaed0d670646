import { Path } from "../models/Path";
import type { Grid } from "../models/Grid";
import type { StepDirection } from "../types/types";
import { PreconditionError } from "../utils/errors";

type TableEntry = { kind: "present"; path: Path } | { kind: "absent" };

const ABSENT: TableEntry = { kind: "absent" };

// Extend a copy of the entry's path, or nothing when the entry or step is missing.
function extend(entry: TableEntry, direction: StepDirection): Path | null {
  if (entry.kind === "absent" || !entry.path.isStepValid(direction)) {
    return null;
  }
  const next = entry.path.clone();
  next.addStep(direction);
  return next;
}

// Solve crane unloading with a table where A[r][c] holds the best path ending
// at (r,c). Filled row-major; ties between predecessors keep the one from above,
// ties in the final scan keep the first entry.
export function craneUnloadingDynProg(setting: Grid): Path {
  if (setting.isEmpty()) {
    throw new PreconditionError("Grid must be non-empty.");
  }

  const A: TableEntry[][] = [];
  for (let r = 0; r < setting.rows(); r++) {
    A.push(new Array<TableEntry>(setting.columns()).fill(ABSENT));
  }
  A[0][0] = { kind: "present", path: new Path(setting) };

  for (let r = 0; r < setting.rows(); r++) {
    for (let c = 0; c < setting.columns(); c++) {
      if (r === 0 && c === 0) continue;
      if (setting.get(r, c) === "Building") continue;

      const fromAbove = r > 0 ? extend(A[r - 1][c], "South") : null;
      const fromLeft = c > 0 ? extend(A[r][c - 1], "East") : null;

      let chosen: Path | null;
      if (fromAbove && fromLeft) {
        chosen =
          fromLeft.totalCranes() > fromAbove.totalCranes() ? fromLeft : fromAbove;
      } else {
        chosen = fromAbove ?? fromLeft;
      }
      if (chosen) A[r][c] = { kind: "present", path: chosen };
    }
  }

  let best: Path | null = null;
  for (const row of A) {
    for (const entry of row) {
      if (
        entry.kind === "present" &&
        (best === null || entry.path.totalCranes() > best.totalCranes())
      ) {
        best = entry.path;
      }
    }
  }
  if (best === null) {
    throw new PreconditionError("No cell holds a path.");
  }

  return best;
}
