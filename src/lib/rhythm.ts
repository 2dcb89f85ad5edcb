/**
 * Euclidean rhythms and the impulse seed built from them.
 */

import type { AudioBuffer, EuclideanSeedOptions } from "@/types/audio";
import { createRandom, gaussian } from "./random";

/**
 * Distributes `pulses` onsets as evenly as possible over `steps` positions
 * using Bjorklund's algorithm.
 *
 * bjorklund(5, 13) → 1001010010100 (as booleans)
 */
export function bjorklund(pulses: number, steps: number): boolean[] {
  if (!Number.isInteger(pulses) || !Number.isInteger(steps)) {
    throw new RangeError(`pulses and steps must be integers, got (${pulses}, ${steps})`);
  }
  if (steps <= 0) return [];
  if (pulses >= steps) return new Array<boolean>(steps).fill(true);
  if (pulses <= 0) return new Array<boolean>(steps).fill(false);

  let groups: boolean[][] = Array.from({ length: pulses }, () => [true]);
  let remainder: boolean[][] = Array.from({ length: steps - pulses }, () => [false]);

  while (remainder.length > 1) {
    const take = Math.min(groups.length, remainder.length);
    const merged: boolean[][] = [];
    for (let i = 0; i < take; i++) {
      merged.push([...groups[i], ...remainder[i]]);
    }
    const leftover = [...groups.slice(take), ...remainder.slice(take)];
    groups = merged;
    remainder = leftover;
  }

  return [...groups, ...remainder].flat();
}

export function formatPattern(pattern: boolean[]): string {
  return pattern.map((on) => (on ? "1" : "0")).join("");
}

/**
 * Builds a seed signal: a unit impulse at every onset of E(pulses, steps),
 * each followed by a short tail of Gaussian noise.
 */
export function synthesizeSeed(options: EuclideanSeedOptions): AudioBuffer {
  const { durationSec, sampleRate, pulses, steps, noiseTailMs, noiseAmplitude } = options;

  const total = Math.max(0, Math.floor(durationSec * sampleRate));
  const samples = new Float32Array(total);
  const pattern = bjorklund(pulses, steps);
  if (pattern.length === 0) return { samples, sampleRate };

  const samplesPerStep = Math.floor(total / steps);
  const tailSamples = Math.max(0, Math.floor((noiseTailMs / 1000) * sampleRate));
  const random = createRandom(options.seed);

  pattern.forEach((isPulse, step) => {
    if (!isPulse) return;
    const position = step * samplesPerStep;
    if (position >= total) return;

    samples[position] = 1.0;
    const tailEnd = Math.min(position + 1 + tailSamples, total);
    for (let i = position + 1; i < tailEnd; i++) {
      samples[i] = gaussian(random) * noiseAmplitude;
    }
  });

  return { samples, sampleRate };
}
