import type { Path } from "../models/Path";
import type { AlgoKey, MapType } from "../types/types";

export interface SolverResult {
  algo: AlgoKey;
  path: Path;
  cranes: number;
  steps: number;
  runtimeMs: number;
}

export interface RunConfig {
  rows: number;
  columns: number;
  mapType: MapType;
  craneDensity: number; // for Random
  buildingDensity: number; // for Random
  seed: number;
}
