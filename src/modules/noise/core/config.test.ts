import { describe, it, expect } from "vitest";
import {
  DEFAULT_NOISE_CONFIG,
  NoiseConfigError,
  parseSeed,
  parseSeedWord,
  resolveNoiseConfig,
} from "./config";
import { octaveAmplitudes } from "./generateFractal";

describe("resolveNoiseConfig", () => {
  it("fills in the defaults", () => {
    expect(resolveNoiseConfig()).toEqual({
      width: 512,
      height: 512,
      octaves: 8,
      attenuation: 0.75,
      seed: [0x243f6a8885a308d3n, 0x13198a2e03707344n],
    });
  });

  it("keeps explicit values and defaults the rest", () => {
    const config = resolveNoiseConfig({ width: 64, octaves: 3, seed: [1n, 2n] });
    expect(config).toEqual({ ...DEFAULT_NOISE_CONFIG, width: 64, octaves: 3, seed: [1n, 2n] });
  });

  it("rejects non-positive or fractional dimensions", () => {
    expect(() => resolveNoiseConfig({ width: 0 })).toThrow(NoiseConfigError);
    expect(() => resolveNoiseConfig({ height: -4 })).toThrow(NoiseConfigError);
    expect(() => resolveNoiseConfig({ width: 10.5 })).toThrow(NoiseConfigError);
  });

  it("rejects an octave count outside [1, 31]", () => {
    expect(() => resolveNoiseConfig({ octaves: 0 })).toThrow(NoiseConfigError);
    expect(() => resolveNoiseConfig({ octaves: 32 })).toThrow(NoiseConfigError);
    expect(resolveNoiseConfig({ octaves: 31 }).octaves).toBe(31);
  });

  it("requires attenuation strictly between 0 and 1", () => {
    expect(() => resolveNoiseConfig({ attenuation: 0 })).toThrow(NoiseConfigError);
    expect(() => resolveNoiseConfig({ attenuation: 1 })).toThrow(NoiseConfigError);
    expect(() => resolveNoiseConfig({ attenuation: Number.NaN })).toThrow(NoiseConfigError);
    expect(resolveNoiseConfig({ attenuation: 0.5 }).attenuation).toBe(0.5);
  });

  it("rejects seed words outside 64 bits", () => {
    expect(() => resolveNoiseConfig({ seed: [-1n, 0n] })).toThrow(NoiseConfigError);
    expect(() => resolveNoiseConfig({ seed: [0n, 1n << 64n] })).toThrow(NoiseConfigError);
  });

  it("rejects attenuations whose finer octaves underflow to zero", () => {
    expect(() => resolveNoiseConfig({ octaves: 4, attenuation: 1e-200 })).toThrow(
      /^Invalid noise configuration: attenuation: finest octave amplitude underflows/
    );
  });

  it("accepts small attenuations while every octave still counts", () => {
    const config = resolveNoiseConfig({ octaves: 2, attenuation: 1e-200 });
    const { descriptors } = octaveAmplitudes(config.octaves, config.attenuation);
    expect(descriptors.map((d) => d.amplitude)).toEqual([1, 1e-200]);
  });

  it("caps the pixel count before allocating", () => {
    expect(() => resolveNoiseConfig({ width: 1 << 14, height: 1 << 13 })).toThrow(
      /width \* height must not exceed/
    );
  });

  it("names every failing field", () => {
    expect(() => resolveNoiseConfig({ width: 0, attenuation: 2 })).toThrow(
      /^Invalid noise configuration: width: .+; attenuation: .+$/
    );
  });
});

describe("parseSeedWord", () => {
  it("accepts decimal and hex", () => {
    expect(parseSeedWord("42")).toBe(42n);
    expect(parseSeedWord("0x243F6A8885A308D3")).toBe(0x243f6a8885a308d3n);
    expect(parseSeedWord(" 0xff ")).toBe(255n);
  });

  it("rejects malformed or oversized words", () => {
    expect(() => parseSeedWord("")).toThrow(NoiseConfigError);
    expect(() => parseSeedWord("-1")).toThrow(NoiseConfigError);
    expect(() => parseSeedWord("0xzz")).toThrow(NoiseConfigError);
    expect(() => parseSeedWord("0x10000000000000000")).toThrow(/must fit in 64 bits/);
  });
});

describe("parseSeed", () => {
  it("splits two comma separated words", () => {
    expect(parseSeed("1,0x10")).toEqual([1n, 16n]);
  });

  it("requires exactly two words", () => {
    expect(() => parseSeed("1")).toThrow(NoiseConfigError);
    expect(() => parseSeed("1,2,3")).toThrow(NoiseConfigError);
  });
});
