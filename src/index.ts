export { Grid } from "./models/Grid";
export { Path } from "./models/Path";
export { craneUnloadingExhaustive } from "./algorithms/Exhaustive";
export { craneUnloadingDynProg } from "./algorithms/DynProg";
export {
  SOLVERS,
  EXHAUSTIVE_MAX_STEPS,
  canRunExhaustive,
  runSolver,
  runAll,
} from "./algorithms/runSolver";
export type { ComparisonResult } from "./algorithms/runSolver";
export { generateEmpty, generateRandom, generateGrid } from "./utils/mapGen/mapGen";
export type { RandomMapOptions } from "./utils/mapGen/mapGen";
export { parseGrid, renderGrid, describePath } from "./utils/textMap/textMap";
export { drawPanel } from "./utils/drawpanel/drawpanel";
export type { PanelContext } from "./utils/drawpanel/drawpanel";
export * from "./utils/errors";
export type { SolverResult, RunConfig } from "./interfaces/interfaces";
export type { Cell, CellKind, StepDirection, MapType, AlgoKey } from "./types/types";
