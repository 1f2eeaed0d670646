export const idOf = (columns: number, r: number, c: number) => r * columns + c;

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// Diagonal bound: every East/South move raises r + c by one
export const maxStepsOf = (rows: number, columns: number) =>
  rows + columns - 2;
