import { Path } from "../models/Path";
import type { Grid } from "../models/Grid";
import { PreconditionError } from "../utils/errors";
import { maxStepsOf } from "../utils/utils";

// Solve crane unloading by trying every East/South sequence of every length.
// Exponential in rows + columns; the grid must be non-empty and
// rows + columns - 2 must stay below 64.
export function craneUnloadingExhaustive(setting: Grid): Path {
  if (setting.isEmpty()) {
    throw new PreconditionError("Grid must be non-empty.");
  }
  const maxSteps = maxStepsOf(setting.rows(), setting.columns());
  if (maxSteps >= 64) {
    throw new PreconditionError(
      `Exhaustive search needs fewer than 64 steps, grid needs ${maxSteps}.`
    );
  }

  let best = new Path(setting);

  for (let steps = 1; steps <= maxSteps; steps++) {
    const candidates = 1n << BigInt(steps);
    for (let bits = 0n; bits < candidates; bits++) {
      const curr = new Path(setting);
      let valid = true;

      // bit k decides step k: 1 east, 0 south
      for (let k = 0; k < steps; k++) {
        const direction = (bits >> BigInt(k)) & 1n ? "East" : "South";
        if (!curr.isStepValid(direction)) {
          valid = false;
          break;
        }
        curr.addStep(direction);
      }

      if (valid && curr.totalCranes() > best.totalCranes()) {
        best = curr;
      }
    }
  }

  return best;
}
