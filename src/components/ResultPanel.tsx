import React from "react";
import type { SolverResult } from "../interfaces/interfaces";
import type { AlgoKey } from "../types/types";

interface ResultPanelProps {
  algo: AlgoKey;
  result: SolverResult | null;
  skipped: boolean;
  children?: React.ReactNode; // canvas
}

export function ResultPanel({ algo, result, skipped, children }: ResultPanelProps) {
  const status = skipped ? "Skipped" : "Done";
  return (
    <div className="panel">
      <div className="panel-header">
        <h2>{algo}</h2>
        <div className="status">{status}</div>
      </div>
      {children}
      <div className="stats">
        <div className="label">Cranes</div>
        <div className="value">{result ? result.cranes : "—"}</div>
        <div className="label">Steps</div>
        <div className="value">{result ? result.steps : "—"}</div>
        <div className="label">Runtime</div>
        <div className="value">{result ? `${result.runtimeMs.toFixed(1)} ms` : "—"}</div>
        <div className="label">End cell</div>
        <div className="value">
          {result ? `(${result.path.finalRow()},${result.path.finalColumn()})` : "—"}
        </div>
      </div>
    </div>
  );
}

export function AgreementBanner({ agree }: { agree: boolean | null }) {
  if (agree === null) {
    return <div className="banner">Only the dynamic-programming solver ran.</div>;
  }
  return (
    <div className={agree ? "banner ok" : "banner mismatch"}>
      {agree ? "Both solvers found the same crane count." : "Crane counts differ!"}
    </div>
  );
}
