import { Grid } from "../../models/Grid";
import type { Path } from "../../models/Path";
import type { CellKind } from "../../types/types";
import { GridParseError } from "../errors";
import { idOf } from "../utils";

const CHAR_KINDS: Record<string, CellKind> = {
  ".": "Empty",
  c: "Crane",
  X: "Building",
};

const KIND_CHARS: Record<CellKind, string> = {
  Empty: ".",
  Crane: "c",
  Building: "X",
};

// path overlays
const ON_PATH: Record<CellKind, string> = {
  Empty: "+",
  Crane: "C",
  Building: "X",
};

// One line per row; surrounding blank lines and trailing spaces are ignored
export function parseGrid(text: string): Grid {
  const lines = text.split(/\r?\n/).map((l) => l.trimEnd());
  while (lines.length && lines[0] === "") lines.shift();
  while (lines.length && lines[lines.length - 1] === "") lines.pop();

  const rows = lines.map((line, r) =>
    Array.from(line, (ch, c) => {
      const kind = CHAR_KINDS[ch];
      if (!kind) throw new GridParseError(r + 1, c + 1, ch);
      return kind;
    })
  );
  return Grid.fromRows(rows);
}

export function renderGrid(grid: Grid, path?: Path): string {
  const onPath = new Set<number>();
  path?.cells().forEach(({ r, c }) => onPath.add(idOf(grid.columns(), r, c)));

  const lines: string[] = [];
  for (let r = 0; r < grid.rows(); r++) {
    let line = "";
    for (let c = 0; c < grid.columns(); c++) {
      const kind = grid.get(r, c);
      line += onPath.has(idOf(grid.columns(), r, c))
        ? ON_PATH[kind]
        : KIND_CHARS[kind];
    }
    lines.push(line);
  }
  return lines.join("\n");
}

export function describePath(path: Path): string {
  const moves = path.steps().map((m) => (m === "East" ? "E" : "S"));
  const n = path.totalCranes();
  return [
    "(0,0)",
    ...moves,
    `-> (${path.finalRow()},${path.finalColumn()}), ${n} crane${n === 1 ? "" : "s"}`,
  ].join(" ");
}
