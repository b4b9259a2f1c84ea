import { writeFileSync } from "fs";
import yargs from "yargs";
import { parseSeed, resolveNoiseConfig } from "../modules/noise/core/config";
import { generateNoiseRaster, rasterDigest } from "../modules/noise/core/generateNoiseRaster";
import { seedWordToHex } from "../modules/noise/utils/random";
import { formatFromPath, writeRaster, type RasterFormat } from "../modules/raster/encodeRaster";

export interface GenerateNoiseResult {
  output: string;
  seedPath: string;
  format: RasterFormat;
  digest: string;
}

/**
 * Parses command line arguments (without the node and script entries),
 * renders the raster and writes it with a `<output>.seed.txt` sidecar.
 * Bad flags reject instead of exiting the process.
 */
export async function runGenerateNoise(args: string[]): Promise<GenerateNoiseResult> {
  const argv = await yargs(args)
    .scriptName("generate-noise")
    .usage("$0 [output]\n\nRender seeded fractal Perlin noise to a grayscale image")
    .option("width", { type: "number", describe: "Image width in pixels (default 512)" })
    .option("height", { type: "number", describe: "Image height in pixels (default 512)" })
    .option("octaves", { type: "number", describe: "Number of octaves (default 8)" })
    .option("attenuation", {
      type: "number",
      describe: "Amplitude factor per finer octave, between 0 and 1 (default 0.75)",
    })
    .option("seed", {
      type: "string",
      describe: "Two 64-bit seed words, decimal or 0x hex, separated by a comma",
    })
    .option("format", {
      choices: ["png", "raw"] as const,
      describe: "Output format (default: from the file extension)",
    })
    .example("$0", "Write output.png with the default configuration")
    .example("$0 noise.bin --octaves 4 --seed 1,2", "Dump raw bytes for a custom seed")
    .strictOptions()
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .help()
    .parse();

  const output = String(argv._[0] ?? "output.png");
  const config = resolveNoiseConfig({
    width: argv.width,
    height: argv.height,
    octaves: argv.octaves,
    attenuation: argv.attenuation,
    seed: argv.seed === undefined ? undefined : parseSeed(argv.seed),
  });

  console.log(
    `Generating ${config.width}x${config.height} noise:`,
    `${config.octaves} octaves, attenuation ${config.attenuation}`
  );

  const raster = generateNoiseRaster(config);
  const format = argv.format ?? formatFromPath(output);

  await writeRaster(raster, output, format);
  console.log("Raster written to:", output);

  const seedPath = `${output}.seed.txt`;
  writeFileSync(seedPath, config.seed.map(seedWordToHex).join("\n") + "\n", "utf8");
  console.log("Seed written to:", seedPath);

  const digest = rasterDigest(raster);
  console.log("SHA-256:", digest);

  return { output, seedPath, format, digest };
}

// Exit code for the process: 0 on success, 1 after reporting the error
export async function runGenerateNoiseCli(args: string[]): Promise<number> {
  try {
    await runGenerateNoise(args);
    return 0;
  } catch (error) {
    console.error("Failed to generate noise:", error);
    return 1;
  }
}
