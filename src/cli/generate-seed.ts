import { writeFile } from "node:fs/promises";
import { formatPattern } from "@/lib/rhythm";
import { SEED_USAGE, SeedOptionsError, parseSeedArgs, renderSeed } from "@/services/seed-file";

async function main(argv: string[]): Promise<void> {
  if (argv.includes("--help") || argv.includes("-h")) {
    console.info(SEED_USAGE);
    return;
  }

  const options = parseSeedArgs(argv);
  const seed = renderSeed(options);

  console.info(`Euclidean rhythm E(${options.pulses},${options.steps}): ${formatPattern(seed.pattern)}`);
  console.info(`Duration: ${options.durationSec}s | Sample rate: ${options.sampleRate}Hz`);
  console.info(`Total samples: ${seed.buffer.samples.length.toLocaleString("en-US")}`);
  console.info(`Samples per step: ${seed.samplesPerStep.toLocaleString("en-US")}`);
  console.info(`Noise tail: ${seed.noiseTailSamples} samples (${options.noiseTailMs}ms)`);

  await writeFile(options.output, seed.wav);

  console.info(`Wrote ${options.output} (${(seed.wav.byteLength / 1024).toFixed(1)} KB)`);
  console.info(`  Format: ${options.sampleRate}Hz / 16-bit / ${options.channels} ch`);
  console.info(`  Impulses: ${seed.impulseCount} in E(${options.pulses},${options.steps})`);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof SeedOptionsError ? `${err.message}\n\n${SEED_USAGE}` : err);
  process.exitCode = 1;
});
