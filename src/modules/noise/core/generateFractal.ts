import type { FractalField, NoiseConfig, OctaveDescriptor } from "../types/NoiseState";
import { createSeededRandom } from "../utils/random";
import { buildGradientGrid } from "./gradientGrid";
import { samplePerlin } from "./perlin";

/**
 * Octaves coarsest first: level runs octaves-1 down to 0, cell size 2^level,
 * amplitude 1, a, a^2, ... The sum of amplitudes is the normalization divisor.
 */
export function octaveAmplitudes(
  octaves: number,
  attenuation: number
): { descriptors: OctaveDescriptor[]; scaleSum: number } {
  const descriptors: OctaveDescriptor[] = [];
  let amplitude = 1;
  let scaleSum = 0;

  for (let level = octaves - 1; level >= 0; level--) {
    descriptors.push({ level, cellSize: 2 ** level, amplitude });
    scaleSum += amplitude;
    amplitude *= attenuation;
  }

  return { descriptors, scaleSum };
}

/**
 * Weighted sum of one Perlin layer per octave, divided by the total weight.
 * All octaves draw their gradients from a single random stream in order, so
 * octave k's grid depends on every grid built before it.
 */
export function generateFractalField(config: NoiseConfig): FractalField {
  const { width, height } = config;
  const values = new Float64Array(width * height);
  const random = createSeededRandom(config.seed);
  const { descriptors, scaleSum } = octaveAmplitudes(config.octaves, config.attenuation);

  for (const { cellSize, amplitude } of descriptors) {
    const grid = buildGradientGrid(cellSize, height, width, random);

    for (let i = 0; i < height; i++) {
      const x = i / cellSize;
      const row = i * width;
      for (let j = 0; j < width; j++) {
        values[row + j] += samplePerlin(grid, x, j / cellSize) * amplitude;
      }
    }
  }

  for (let k = 0; k < values.length; k++) {
    values[k] /= scaleSum;
  }

  return { width, height, values, scaleSum, octaves: descriptors };
}
