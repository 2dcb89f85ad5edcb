/**
 * Maps the performer-facing control knobs onto the engine's generation
 * parameters. Every mapping saturates at its target range.
 */

import {
  CFG_TYPE,
  INSTRUMENTAL_LYRICS,
  SCHEDULER_TYPE,
} from "@/constants";
import type { GenerationParams } from "@/types/model";

export interface ControlKnobs {
  prompt: string;
  guidanceScale: number;
  numSteps: number;
  seed: number;
  inputStrength: number;
  /** 1 (structure) .. 10 (texture) */
  shift: number;
  inferMethod: string;
  entropy: number;
  granularity: number;
  audioDuration: number;
  denoiseStrength: number;
  taskType: string;
  thinking: boolean;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** shift [1,10] → guidance_interval [0.1,0.9] */
export function shiftToGuidanceInterval(shift: number): number {
  return clamp(0.1 + ((shift - 1) / 9) * 0.8, 0.1, 0.9);
}

/** entropy [0,1] → omega_scale [1,20] */
export function entropyToOmegaScale(entropy: number): number {
  return clamp(1 + entropy * 19, 1, 20);
}

/** granularity [0,1] → guidance_interval_decay [0,1] */
export function granularityToIntervalDecay(granularity: number): number {
  return clamp(granularity, 0, 1);
}

export function methodToRetakeVariance(method: string): number {
  return method === "sde" ? 0.5 : 0.0;
}

/**
 * Number of diffusion steps to actually run, or null when the denoise
 * strength is zero and the engine must not be called at all.
 */
export function resolveEffectiveSteps(numSteps: number, denoiseStrength: number): number | null {
  const strength = clamp(denoiseStrength, 0, 1);
  if (strength <= 0) return null;
  return Math.max(1, Math.round(numSteps * strength));
}

/** Floor for CFG during guidance decay. */
export function minGuidanceScale(guidanceScale: number): number {
  return Math.max(1.0, guidanceScale * 0.2);
}

/** Negative seeds ask for a time-derived one. */
export function resolveSeed(seed: number, now: number = Date.now()): number {
  if (seed >= 0) return seed;
  return Math.floor(now) % 2 ** 32;
}

export function mapControls(knobs: ControlKnobs, now: number = Date.now()): GenerationParams {
  const denoiseStrength = clamp(knobs.denoiseStrength, 0, 1);

  return {
    prompt: knobs.prompt,
    lyrics: INSTRUMENTAL_LYRICS,
    guidanceScale: knobs.guidanceScale,
    numSteps: knobs.numSteps,
    effectiveSteps: resolveEffectiveSteps(knobs.numSteps, denoiseStrength),
    seed: resolveSeed(knobs.seed, now),
    inputStrength: knobs.inputStrength,
    audioDuration: knobs.audioDuration,
    denoiseStrength,
    guidanceInterval: shiftToGuidanceInterval(knobs.shift),
    guidanceIntervalDecay: granularityToIntervalDecay(knobs.granularity),
    omegaScale: entropyToOmegaScale(knobs.entropy),
    minGuidanceScale: minGuidanceScale(knobs.guidanceScale),
    retakeVariance: methodToRetakeVariance(knobs.inferMethod),
    schedulerType: SCHEDULER_TYPE,
    cfgType: CFG_TYPE,
    useErgTag: true,
    useErgLyric: true,
    useErgDiffusion: true,
    taskType: knobs.taskType,
    thinking: knobs.thinking,
  };
}
