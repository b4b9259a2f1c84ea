import { hideBin } from "yargs/helpers";
import { runGenerateNoiseCli } from "./runGenerateNoise";

const code = await runGenerateNoiseCli(hideBin(process.argv));
process.exit(code);
