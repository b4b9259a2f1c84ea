import { z } from "zod";
import type { NoiseConfig, NoiseConfigInput, NoiseSeed } from "../types/NoiseState";
import { octaveAmplitudes } from "./generateFractal";

const MAX_PIXELS = 1 << 26;
const SEED_WORD_LIMIT = 1n << 64n;
// Smallest normal double; below it amplitude * attenuation may stop decreasing
const MIN_AMPLITUDE = 2 ** -1022;

export const DEFAULT_SEED: NoiseSeed = [0x243f6a8885a308d3n, 0x13198a2e03707344n];

export const DEFAULT_NOISE_CONFIG: NoiseConfig = {
  width: 512,
  height: 512,
  octaves: 8,
  attenuation: 0.75,
  seed: DEFAULT_SEED,
};

export class NoiseConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NoiseConfigError";
  }
}

const seedWord = z.bigint().nonnegative().lt(SEED_WORD_LIMIT, "must fit in 64 bits");

export const noiseConfigSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    // 2^(octaves - 1) is the coarsest cell size
    octaves: z.number().int().min(1).max(31),
    attenuation: z.number().gt(0).lt(1),
    seed: z.tuple([seedWord, seedWord]),
  })
  .refine((c) => c.width * c.height <= MAX_PIXELS, {
    message: `width * height must not exceed ${MAX_PIXELS} pixels`,
    path: ["width"],
  })
  .refine(
    (c) =>
      octaveAmplitudes(c.octaves, c.attenuation).descriptors.every(
        (d) => d.amplitude >= MIN_AMPLITUDE
      ),
    {
      message: "finest octave amplitude underflows; raise attenuation or lower octaves",
      path: ["attenuation"],
    }
  );

export function resolveNoiseConfig(input: NoiseConfigInput = {}): NoiseConfig {
  const candidate = {
    width: input.width ?? DEFAULT_NOISE_CONFIG.width,
    height: input.height ?? DEFAULT_NOISE_CONFIG.height,
    octaves: input.octaves ?? DEFAULT_NOISE_CONFIG.octaves,
    attenuation: input.attenuation ?? DEFAULT_NOISE_CONFIG.attenuation,
    seed: input.seed ?? DEFAULT_NOISE_CONFIG.seed,
  };

  const result = noiseConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new NoiseConfigError(`Invalid noise configuration: ${details}`);
  }
  return result.data;
}

export function parseSeedWord(text: string): bigint {
  const trimmed = text.trim();
  if (!/^(0x[0-9a-f]+|[0-9]+)$/i.test(trimmed)) {
    throw new NoiseConfigError(`Invalid seed word "${text}": expected decimal or 0x hex`);
  }
  const word = BigInt(trimmed);
  if (word >= SEED_WORD_LIMIT) {
    throw new NoiseConfigError(`Invalid seed word "${text}": must fit in 64 bits`);
  }
  return word;
}

// "a,b" -> [a, b]
export function parseSeed(text: string): NoiseSeed {
  const parts = text.split(",");
  if (parts.length !== 2) {
    throw new NoiseConfigError(`Invalid seed "${text}": expected two words separated by a comma`);
  }
  return [parseSeedWord(parts[0]), parseSeedWord(parts[1])];
}
