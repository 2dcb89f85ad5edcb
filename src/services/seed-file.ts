/**
 * Options and rendering for the Euclidean seed WAV written by the seed CLI.
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { SEED_DEFAULTS } from "@/constants";
import { describeError } from "@/lib/logger";
import { bjorklund, synthesizeSeed } from "@/lib/rhythm";
import { formatIssues } from "@/lib/schemas";
import { encodePcm16Wav } from "@/lib/wav-codec";
import type { AudioBuffer } from "@/types/audio";

export const seedOptionsSchema = z.object({
  durationSec: z.coerce.number().positive().default(SEED_DEFAULTS.durationSec),
  sampleRate: z.coerce.number().int().positive().default(SEED_DEFAULTS.sampleRate),
  pulses: z.coerce.number().int().min(0).default(SEED_DEFAULTS.pulses),
  steps: z.coerce.number().int().positive().default(SEED_DEFAULTS.steps),
  noiseTailMs: z.coerce.number().min(0).default(SEED_DEFAULTS.noiseTailMs),
  noiseAmplitude: z.coerce.number().min(0).default(SEED_DEFAULTS.noiseAmplitude),
  channels: z.coerce.number().int().min(1).max(8).default(SEED_DEFAULTS.channels),
  seed: z.coerce.number().int().optional(),
  output: z.string().min(1).default(SEED_DEFAULTS.output),
});

export type SeedOptions = z.infer<typeof seedOptionsSchema>;

export const SEED_USAGE = `Usage: resonator-seed [options]

  --duration <sec>         Length in seconds (default: ${SEED_DEFAULTS.durationSec})
  --sample-rate <hz>       Sample rate (default: ${SEED_DEFAULTS.sampleRate})
  --pulses <k>             Euclidean pulses (default: ${SEED_DEFAULTS.pulses})
  --steps <n>              Euclidean steps (default: ${SEED_DEFAULTS.steps})
  --noise-tail-ms <ms>     Noise tail after each impulse (default: ${SEED_DEFAULTS.noiseTailMs})
  --noise-amplitude <a>    Noise tail amplitude (default: ${SEED_DEFAULTS.noiseAmplitude})
  --channels <n>           Output channels, mono copied to each (default: ${SEED_DEFAULTS.channels})
  --seed <n>               Fix the noise for reproducible output
  --output <path>          Output file (default: ${SEED_DEFAULTS.output})
`;

export class SeedOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SeedOptionsError";
  }
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        duration: { type: "string" },
        "sample-rate": { type: "string" },
        pulses: { type: "string" },
        steps: { type: "string" },
        "noise-tail-ms": { type: "string" },
        "noise-amplitude": { type: "string" },
        channels: { type: "string" },
        seed: { type: "string" },
        output: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new SeedOptionsError(describeError(err));
  }
}

export function parseSeedArgs(argv: string[]): SeedOptions {
  const values = parseFlags(argv);
  const parsed = seedOptionsSchema.safeParse({
    durationSec: values.duration,
    sampleRate: values["sample-rate"],
    pulses: values.pulses,
    steps: values.steps,
    noiseTailMs: values["noise-tail-ms"],
    noiseAmplitude: values["noise-amplitude"],
    channels: values.channels,
    seed: values.seed,
    output: values.output,
  });
  if (!parsed.success) {
    throw new SeedOptionsError(`Invalid options: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export interface RenderedSeed {
  pattern: boolean[];
  buffer: AudioBuffer;
  wav: Uint8Array;
  impulseCount: number;
  samplesPerStep: number;
  noiseTailSamples: number;
}

export function renderSeed(options: SeedOptions): RenderedSeed {
  const pattern = bjorklund(options.pulses, options.steps);
  const buffer = synthesizeSeed(options);
  const samplesPerStep = Math.floor(buffer.samples.length / options.steps);

  return {
    pattern,
    buffer,
    wav: encodePcm16Wav(buffer, { channels: options.channels }),
    impulseCount: pattern.filter(
      (isPulse, step) => isPulse && step * samplesPerStep < buffer.samples.length,
    ).length,
    samplesPerStep,
    noiseTailSamples: Math.floor((options.noiseTailMs / 1000) * options.sampleRate),
  };
}
