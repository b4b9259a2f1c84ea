import type { GradientGrid, Vec2 } from "../types/NoiseState";
import { ceilDiv } from "../utils/intMath";
import type { RandomSource } from "../utils/random";

const TAU = Math.PI * 2;

/**
 * Lattice of unit gradients covering a height x width image at the given
 * cell size. Points are filled row by row, one random sample each, so the
 * same random stream always yields the same grid.
 */
export function buildGradientGrid(
  cellSize: number,
  height: number,
  width: number,
  random: RandomSource
): GradientGrid {
  const rows = ceilDiv(height, cellSize) + 1;
  const cols = ceilDiv(width, cellSize) + 1;
  const vectors = new Float64Array(rows * cols * 2);

  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      const theta = random() * TAU;
      const k = (i * cols + j) * 2;
      vectors[k] = Math.cos(theta);
      vectors[k + 1] = Math.sin(theta);
    }
  }

  return { cellSize, rows, cols, vectors };
}

export function gradientAt(grid: GradientGrid, i: number, j: number): Vec2 {
  const k = (i * grid.cols + j) * 2;
  return { x: grid.vectors[k], y: grid.vectors[k + 1] };
}
