import { mkdirSync, writeFileSync } from "fs";
import { dirname, extname } from "path";
import sharp from "sharp";
import type { GrayscaleRaster } from "../../core/Raster";

export type RasterFormat = "png" | "raw";

// .bin / .raw are bare byte dumps, anything else is PNG
export function formatFromPath(path: string): RasterFormat {
  const ext = extname(path).toLowerCase();
  return ext === ".bin" || ext === ".raw" ? "raw" : "png";
}

// Copy of the raster bytes; writing to it leaves the raster untouched
export function encodeRaw(raster: GrayscaleRaster): Buffer {
  return Buffer.from(raster.data);
}

// Single-channel 8-bit PNG
export async function encodePng(raster: GrayscaleRaster): Promise<Buffer> {
  return sharp(encodeRaw(raster), {
    raw: { width: raster.width, height: raster.height, channels: 1 },
  })
    .toColourspace("b-w")
    .png()
    .toBuffer();
}

export async function writeRaster(
  raster: GrayscaleRaster,
  path: string,
  format: RasterFormat = formatFromPath(path)
): Promise<void> {
  const bytes = format === "png" ? await encodePng(raster) : encodeRaw(raster);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, bytes);
}
