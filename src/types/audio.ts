/** Mono 32-bit float audio paired with its sample rate. */
export interface AudioBuffer {
  samples: Float32Array;
  sampleRate: number;
}

/** WAV `fmt ` format codes the codec understands. */
export const WavFormatCode = {
  PCM: 1,
  IEEE_FLOAT: 3,
} as const;

export interface WavInfo {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  /** Length of the `data` payload actually present in the buffer. */
  dataBytes: number;
}

export type WavErrorCode =
  | "MalformedContainer"
  | "InvalidMagic"
  | "MissingChunk"
  | "UnsupportedFormat";

export interface EuclideanSeedOptions {
  durationSec: number;
  sampleRate: number;
  pulses: number;
  steps: number;
  noiseTailMs: number;
  noiseAmplitude: number;
  /** Fixes the noise tails. Omit for fresh noise on every call. */
  seed?: number;
}
