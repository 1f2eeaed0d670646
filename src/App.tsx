import React, { useEffect, useMemo, useRef, useState } from "react";
import { ResultPanel, AgreementBanner } from "./components/ResultPanel";
import { runAll } from "./algorithms/runSolver";
import type { SolverResult } from "./interfaces/interfaces";
import type { AlgoKey, MapType } from "./types/types";
import { drawPanel } from "./utils/drawpanel/drawpanel";
import { generateGrid } from "./utils/mapGen/mapGen";
import { maxStepsOf } from "./utils/utils";

// =====================
// Crane Unloading Lab
// - Side-by-side exhaustive search and dynamic programming on one grid
// - Configurable size, map type, crane/building density, seed
// - Exhaustive is skipped past LAB_EXHAUSTIVE_LIMIT steps, it doubles per step
// =====================

export const LAB_EXHAUSTIVE_LIMIT = 16;
const MAX_SIDE = 40;
const ALGOS: AlgoKey[] = ["Exhaustive", "DynProg"];

const clampSide = (v: number) => Math.max(1, Math.min(MAX_SIDE, v || 1));

export default function CraneLab() {
  const [rows, setRows] = useState(6);
  const [columns, setColumns] = useState(6);
  const [mapType, setMapType] = useState<MapType>("Random");
  const [craneDensity, setCraneDensity] = useState(0.3);
  const [buildingDensity, setBuildingDensity] = useState(0.15);
  const [seed, setSeed] = useState(1);
  const sizePx = 360;

  const grid = useMemo(
    () =>
      generateGrid({ rows, columns, mapType, craneDensity, buildingDensity, seed }),
    [rows, columns, mapType, craneDensity, buildingDensity, seed]
  );

  const comparison = useMemo(() => runAll(grid, LAB_EXHAUSTIVE_LIMIT), [grid]);

  const resultOf = (key: AlgoKey): SolverResult | null =>
    comparison.results.find((r) => r.algo === key) ?? null;

  const canvasRefs: Record<AlgoKey, React.RefObject<HTMLCanvasElement>> = {
    Exhaustive: useRef<HTMLCanvasElement>(null),
    DynProg: useRef<HTMLCanvasElement>(null),
  };
  useEffect(() => {
    ALGOS.forEach((key) => {
      const cvs = canvasRefs[key].current;
      if (!cvs) return;
      const ctx = cvs.getContext("2d");
      if (!ctx) return;
      drawPanel(ctx, grid, sizePx, resultOf(key)?.path ?? null);
    });
  }, [grid, comparison]);

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header>
          <h1>Crane Unloading Lab</h1>
          <p>Exhaustive search · dynamic programming on East/South paths</p>
        </header>

        {/* Controls */}
        <div className="controls">
          <div className="control-card">
            <label>Rows</label>
            <input type="number" value={rows} min={1} max={MAX_SIDE} onChange={(e) => setRows(clampSide(Number(e.target.value)))} />
            <label>Columns</label>
            <input type="number" value={columns} min={1} max={MAX_SIDE} onChange={(e) => setColumns(clampSide(Number(e.target.value)))} />
            <div className="hint">Exhaustive runs up to {LAB_EXHAUSTIVE_LIMIT} steps (rows + columns − 2 = {maxStepsOf(rows, columns)})</div>
          </div>
          <div className="control-card">
            <label>Map Type</label>
            <select value={mapType} onChange={(e) => setMapType(e.target.value === "Empty" ? "Empty" : "Random")}>
              <option>Empty</option>
              <option>Random</option>
            </select>
            {mapType === "Random" && (
              <>
                <label>Cranes: {(craneDensity * 100).toFixed(0)}%</label>
                <input type="range" min={0} max={1 - buildingDensity} step={0.01} value={craneDensity} onChange={(e) => setCraneDensity(Number(e.target.value))} />
                <label>Buildings: {(buildingDensity * 100).toFixed(0)}%</label>
                <input type="range" min={0} max={1 - craneDensity} step={0.01} value={buildingDensity} onChange={(e) => setBuildingDensity(Number(e.target.value))} />
              </>
            )}
          </div>
          <div className="control-card">
            <label>Seed</label>
            <input type="number" value={seed} onChange={(e) => setSeed(Number(e.target.value) || 0)} />
            <div className="hint">Reproducible maps</div>
          </div>
        </div>

        <AgreementBanner agree={comparison.agree} />

        {/* Panels */}
        <div className="panels">
          {ALGOS.map((key) => (
            <ResultPanel key={key} algo={key} result={resultOf(key)} skipped={key === "Exhaustive" && !resultOf(key)}>
              <canvas ref={canvasRefs[key]} width={sizePx} height={sizePx} />
            </ResultPanel>
          ))}
        </div>

        <footer>
          Colors: buildings slate, cranes amber, path green (dark on cranes), start green, end violet.
        </footer>
      </div>
    </div>
  );
}
