import type { GrayscaleRaster } from "../../../core/Raster";
import type { FractalField } from "../types/NoiseState";

// Helper: clamp value into [min, max]
export function clamp(v: number, min: number, max: number): number {
  if (v < min) return min;
  if (v > max) return max;
  return v;
}

// -1..1 -> 0..255, out-of-range input saturates
export function quantizeValue(v: number): number {
  return Math.round(clamp(v, -1, 1) * 127.5 + 127.5);
}

export function quantizeField(field: FractalField): GrayscaleRaster {
  const { width, height, values } = field;
  const data = new Uint8Array(width * height);
  for (let i = 0; i < data.length; i++) {
    data[i] = quantizeValue(values[i]);
  }
  return { width, height, data };
}
