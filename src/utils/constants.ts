export const map_color_constants = {
  emptyColor: "#f8fafc",
  craneColor: "#fbbf24",
  buildingColor: "#0f172a",
  pathColor: "#86efac",
  pathCraneColor: "#16a34a",
  startColor: "#22c55e",
  endColor: "#8b5cf6",
  gridLineColor: "#e2e8f0",
};
