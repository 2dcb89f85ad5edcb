import type { EngineOutput } from "@/types/model";

/**
 * Folds engine output down to one channel by per-sample mean.
 * Channels must all have the same length.
 */
export function mixToMono(output: EngineOutput): Float32Array {
  if (output instanceof Float32Array) return output;
  if (output.length === 0) {
    throw new Error("Engine returned no channels");
  }
  if (output.length === 1) return output[0];

  const length = output[0].length;
  if (output.some((channel) => channel.length !== length)) {
    throw new Error("Engine returned channels of different lengths");
  }

  const mono = new Float32Array(length);
  for (let i = 0; i < length; i++) {
    let sum = 0;
    for (const channel of output) sum += channel[i];
    mono[i] = sum / output.length;
  }
  return mono;
}
