import type { RunConfig } from "../../interfaces/interfaces";
import { Grid } from "../../models/Grid";
import type { CellKind } from "../../types/types";
import { rngLCG } from "../utils";

// ---------- Map Generation ----------
export function generateEmpty(rows: number, columns: number) {
  return new Grid(rows, columns); // all empty
}

export interface RandomMapOptions {
  rows: number;
  columns: number;
  craneDensity: number;
  buildingDensity: number;
  seed: number;
}

// One draw per cell, row-major: buildings below buildingDensity, cranes in
// the next craneDensity slice, empty otherwise.
export function generateRandom({
  rows,
  columns,
  craneDensity,
  buildingDensity,
  seed,
}: RandomMapOptions) {
  for (const d of [craneDensity, buildingDensity]) {
    if (!(d >= 0 && d <= 1)) {
      throw new RangeError(`Density ${d} is outside [0, 1].`);
    }
  }
  if (craneDensity + buildingDensity > 1) {
    throw new RangeError("Crane and building densities add up to more than 1.");
  }

  const kinds: CellKind[] = [];
  const R = rngLCG(seed);
  for (let i = 0; i < rows * columns; i++) {
    const p = R.next().value;
    if (p < buildingDensity) kinds.push("Building");
    else if (p < buildingDensity + craneDensity) kinds.push("Crane");
    else kinds.push("Empty");
  }
  // start is never a building
  if (kinds[0] === "Building") kinds[0] = "Empty";
  return new Grid(rows, columns, kinds);
}

export function generateGrid(config: RunConfig) {
  const { rows, columns, mapType, craneDensity, buildingDensity, seed } = config;
  if (mapType === "Empty") return generateEmpty(rows, columns);
  return generateRandom({ rows, columns, craneDensity, buildingDensity, seed });
}
