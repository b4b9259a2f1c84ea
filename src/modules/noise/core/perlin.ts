import type { GradientGrid } from "../types/NoiseState";

// Smoothstep blend a0 + w^2 (3 - 2w) (a1 - a0), written so both ends are exact.
export function interpolate(a0: number, a1: number, w: number): number {
  const s = w * w * (3 - 2 * w);
  return a0 * (1 - s) + a1 * s;
}

export function dotGridGradient(
  grid: GradientGrid,
  ix: number,
  iy: number,
  x: number,
  y: number
): number {
  const k = (ix * grid.cols + iy) * 2;
  const dx = x - ix;
  const dy = y - iy;
  return dx * grid.vectors[k] + dy * grid.vectors[k + 1];
}

/**
 * Perlin noise at (x, y) in lattice units. x runs along grid rows, y along
 * columns; both must keep x + 1 and y + 1 inside the grid.
 */
export function samplePerlin(grid: GradientGrid, x: number, y: number): number {
  const x0 = Math.floor(x);
  const y0 = Math.floor(y);
  const x1 = x0 + 1;
  const y1 = y0 + 1;

  const sx = x - x0;
  const sy = y - y0;

  const top = interpolate(
    dotGridGradient(grid, x0, y0, x, y),
    dotGridGradient(grid, x1, y0, x, y),
    sx
  );
  const bottom = interpolate(
    dotGridGradient(grid, x0, y1, x, y),
    dotGridGradient(grid, x1, y1, x, y),
    sx
  );

  return interpolate(top, bottom, sy);
}
