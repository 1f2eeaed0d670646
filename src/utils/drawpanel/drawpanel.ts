import type { Grid } from "../../models/Grid";
import type { Path } from "../../models/Path";
import { map_color_constants } from "../constants";
const {
  emptyColor,
  craneColor,
  buildingColor,
  pathColor,
  pathCraneColor,
  startColor,
  endColor,
  gridLineColor,
} = map_color_constants;

export type PanelContext = Pick<
  CanvasRenderingContext2D,
  | "clearRect"
  | "fillRect"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "stroke"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
>;

// ---------- Canvas Drawing ----------

export const drawPanel = (
  ctx: PanelContext,
  grid: Grid,
  sizePx: number,
  path: Path | null
) => {
  const rows = grid.rows(),
    columns = grid.columns();
  ctx.clearRect(0, 0, sizePx, sizePx);
  if (grid.isEmpty()) return;
  const cell = sizePx / Math.max(rows, columns);

  // background cells
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < columns; c++) {
      const kind = grid.get(r, c);
      ctx.fillStyle =
        kind === "Building"
          ? buildingColor
          : kind === "Crane"
            ? craneColor
            : emptyColor;
      ctx.fillRect(c * cell, r * cell, cell, cell);
    }
  }
  if (path) {
    for (const { r, c } of path.cells()) {
      ctx.fillStyle = grid.get(r, c) === "Crane" ? pathCraneColor : pathColor;
      ctx.fillRect(c * cell, r * cell, cell, cell);
    }
    // end overlay
    ctx.fillStyle = endColor;
    ctx.fillRect(path.finalColumn() * cell, path.finalRow() * cell, cell, cell);
  }
  // start overlay
  ctx.fillStyle = startColor;
  ctx.fillRect(0, 0, cell, cell);
  // grid lines (light)
  ctx.strokeStyle = gridLineColor;
  ctx.lineWidth = 0.5;
  for (let i = 0; i <= rows; i++) {
    ctx.beginPath();
    ctx.moveTo(0, i * cell);
    ctx.lineTo(columns * cell, i * cell);
    ctx.stroke();
  }
  for (let j = 0; j <= columns; j++) {
    ctx.beginPath();
    ctx.moveTo(j * cell, 0);
    ctx.lineTo(j * cell, rows * cell);
    ctx.stroke();
  }
};
