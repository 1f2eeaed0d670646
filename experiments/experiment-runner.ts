// experiments/experiment-runner.ts
//
// Offline experiments for the Crane Unloading Lab.
// Runs the exhaustive and dynamic-programming solvers on many seeded random
// grids, cross-checks their crane counts and writes a CSV file with timings.
//
// Run with:
//   npm run experiment
//
// CSV output: experiments/results.csv

import { writeFileSync } from "fs";
import { runAll } from "../src/algorithms/runSolver";
import { generateRandom } from "../src/utils/mapGen/mapGen";

// ---------- Experiment parameters (EDIT THESE AS YOU LIKE) ----------
const OUTPUT_CSV = "experiments/results.csv";

// how many seeds per configuration
const NUM_TRIALS = 20;

// square grid sides to test; exhaustive only runs while 2 * N - 2 <= EXHAUSTIVE_LIMIT
const NS = [2, 4, 6, 8, 10, 12, 50, 100];

const CRANE_DENSITIES = [0.2, 0.5];
const BUILDING_DENSITIES = [0, 0.15];

// exhaustive doubles per step, keep this modest
const EXHAUSTIVE_LIMIT = 16;

// ---------- Main experiment loop ----------
function main() {
  const rows: string[] = [];
  rows.push([
    "trial",
    "rows",
    "columns",
    "craneDensity",
    "buildingDensity",
    "seed",
    "algo",
    "runtimeMs",
    "cranes",
    "steps",
    "agree",
  ].join(","));

  let trialIndex = 0;
  let mismatches = 0;

  for (const N of NS) {
    for (const craneDensity of CRANE_DENSITIES) {
      for (const buildingDensity of BUILDING_DENSITIES) {
        for (let t = 0; t < NUM_TRIALS; t++) {
          const seed = 1000 * trialIndex + t;
          const grid = generateRandom({
            rows: N,
            columns: N,
            craneDensity,
            buildingDensity,
            seed,
          });

          const { results, agree } = runAll(grid, EXHAUSTIVE_LIMIT);
          if (agree === false) {
            mismatches++;
            console.error(
              `Mismatch on trial ${trialIndex}: ${results.map((r) => `${r.algo}=${r.cranes}`).join(", ")}`
            );
          }

          for (const r of results) {
            rows.push([
              trialIndex.toString(),
              N.toString(),
              N.toString(),
              craneDensity.toString(),
              buildingDensity.toString(),
              seed.toString(),
              r.algo,
              r.runtimeMs.toFixed(4),
              r.cranes.toString(),
              r.steps.toString(),
              agree == null ? "" : (agree ? "1" : "0"),
            ].join(","));
          }

          trialIndex++;
        }
        console.log(
          `Done ${NUM_TRIALS} trials :: N=${N}, cranes=${craneDensity}, buildings=${buildingDensity}`
        );
      }
    }
  }

  writeFileSync(OUTPUT_CSV, rows.join("\n"), "utf8");
  console.log(`\nWrote ${rows.length - 1} rows to ${OUTPUT_CSV}`);
  if (mismatches > 0) {
    console.error(`${mismatches} trial(s) disagreed.`);
    process.exitCode = 1;
  }
}

main();
