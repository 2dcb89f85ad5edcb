/**
 * Shared defaults for the bridge server, its client and the seed CLI.
 */

export const BRIDGE_VERSION = "0.2.0";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8976;

/** Nominal rate the host application streams at. Reported by /status. */
export const DEFAULT_SAMPLE_RATE = 48000;
/** One second of audio at the nominal rate. */
export const DEFAULT_BUFFER_SIZE = 48000;

export const DEFAULT_MAX_BODY_MB = 64;

// --- Inference request defaults ---

export const INFER_DEFAULTS = {
  prompt: "",
  guidanceScale: 15.0,
  numSteps: 20,
  seed: -1,
  inputStrength: 0.6,
  shift: 5.0,
  inferMethod: "ode",
  entropy: 0.25,
  granularity: 0.45,
  audioDuration: 10.0,
  denoiseStrength: 1.0,
  taskType: "cover",
  thinking: false,
} as const;

export const SCHEDULER_TYPE = "euler";
export const CFG_TYPE = "apg";
export const INSTRUMENTAL_LYRICS = "[inst]";

// --- Euclidean seed ---

export const SEED_DEFAULTS = {
  durationSec: 10.0,
  sampleRate: 48000,
  pulses: 5,
  steps: 13,
  noiseTailMs: 20.0,
  noiseAmplitude: 0.01,
  channels: 2,
  output: "euclidean_seed.wav",
} as const;

// --- Client ---

export const HEALTH_POLL_INTERVAL_MS = 10_000;
export const HEALTH_TIMEOUT_MS = 3_000;
export const INFER_TIMEOUT_MS = 300_000;
