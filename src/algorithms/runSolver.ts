import type { SolverResult } from "../interfaces/interfaces";
import type { Grid } from "../models/Grid";
import type { Path } from "../models/Path";
import type { AlgoKey } from "../types/types";
import { maxStepsOf } from "../utils/utils";
import { craneUnloadingDynProg } from "./DynProg";
import { craneUnloadingExhaustive } from "./Exhaustive";

export const SOLVERS: Record<AlgoKey, (grid: Grid) => Path> = {
  Exhaustive: craneUnloadingExhaustive,
  DynProg: craneUnloadingDynProg,
};

// Largest diagonal the exhaustive enumeration accepts.
export const EXHAUSTIVE_MAX_STEPS = 63;

export function canRunExhaustive(grid: Grid, limit = EXHAUSTIVE_MAX_STEPS) {
  return (
    !grid.isEmpty() &&
    maxStepsOf(grid.rows(), grid.columns()) <= Math.min(limit, EXHAUSTIVE_MAX_STEPS)
  );
}

export function runSolver(algo: AlgoKey, grid: Grid): SolverResult {
  const begin = performance.now();
  const path = SOLVERS[algo](grid);
  return {
    algo,
    path,
    cranes: path.totalCranes(),
    steps: path.stepCount(),
    runtimeMs: performance.now() - begin,
  };
}

export interface ComparisonResult {
  results: SolverResult[];
  // null when only one solver ran
  agree: boolean | null;
}

// DynProg always runs; Exhaustive only when the grid is small enough.
export function runAll(grid: Grid, exhaustiveLimit = EXHAUSTIVE_MAX_STEPS): ComparisonResult {
  const results: SolverResult[] = [];
  if (canRunExhaustive(grid, exhaustiveLimit)) {
    results.push(runSolver("Exhaustive", grid));
  }
  results.push(runSolver("DynProg", grid));

  const agree =
    results.length < 2
      ? null
      : results.every((r) => r.cranes === results[0].cranes);
  return { results, agree };
}
