// Two unsigned 64-bit words
export type NoiseSeed = readonly [bigint, bigint];

export interface NoiseConfig {
  width: number;
  height: number;
  octaves: number;
  attenuation: number; // 0 < a < 1, amplitude decay per octave
  seed: NoiseSeed;
}

export type NoiseConfigInput = Partial<NoiseConfig>;

export interface Vec2 {
  x: number;
  y: number;
}

export interface GradientGrid {
  cellSize: number;
  rows: number;           // ceil(height / cellSize) + 1
  cols: number;           // ceil(width / cellSize) + 1
  vectors: Float64Array;  // interleaved (gx, gy), row-major
}

export interface OctaveDescriptor {
  level: number;
  cellSize: number; // 2^level
  amplitude: number;
}

export interface FractalField {
  width: number;
  height: number;
  values: Float64Array;   // row-major, normalized by scaleSum
  scaleSum: number;
  octaves: OctaveDescriptor[];
}
