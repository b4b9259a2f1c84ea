export interface GrayscaleRaster {
  width: number;
  height: number;
  data: Uint8Array; // row-major, one byte per pixel, 0..255
}
