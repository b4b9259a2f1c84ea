import Alea from "alea";
import type { NoiseSeed } from "../types/NoiseState";

export type RandomSource = () => number;

export function seedWordToHex(word: bigint): string {
  return "0x" + word.toString(16);
}

/**
 * Alea seeded with both seed words as hex strings, in order.
 * Changing either the generator or this formatting changes every raster.
 */
export function createSeededRandom(seed: NoiseSeed): RandomSource {
  const rng = Alea(seedWordToHex(seed[0]), seedWordToHex(seed[1]));
  return () => rng();
}
