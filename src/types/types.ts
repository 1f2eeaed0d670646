export type Cell = { r: number; c: number };

export type CellKind = "Empty" | "Crane" | "Building";

export type StepDirection = "East" | "South";

export type MapType = "Empty" | "Random";

export type AlgoKey = "Exhaustive" | "DynProg";
