import { createHash } from "crypto";
import type { GrayscaleRaster } from "../../../core/Raster";
import type { NoiseConfigInput } from "../types/NoiseState";
import { resolveNoiseConfig } from "./config";
import { generateFractalField } from "./generateFractal";
import { quantizeField } from "./quantize";

export function generateNoiseRaster(input: NoiseConfigInput = {}): GrayscaleRaster {
  const config = resolveNoiseConfig(input);
  return quantizeField(generateFractalField(config));
}

export function rasterDigest(raster: GrayscaleRaster): string {
  return createHash("sha256").update(raster.data).digest("hex");
}
