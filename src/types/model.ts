import type { AudioBuffer } from "./audio";

export type DeviceKind = "cpu" | "mps" | "cuda";
export type RequestedDevice = DeviceKind | "auto";
export type DeviceState = RequestedDevice | "none";

export type ModelType = "turbo" | "sft" | "base" | "unknown";

export type ModelStatus = "unloaded" | "loaded" | "error";

export interface ModelState {
  status: ModelStatus;
  isLoaded: boolean;
  device: DeviceState;
  modelType: ModelType;
  modelPath: string | null;
  loadError: string | null;
  inferenceCount: number;
}

export type InferMethod = "ode" | "sde";

export interface GenerationParams {
  prompt: string;
  lyrics: string;
  guidanceScale: number;
  numSteps: number;
  /** null means the request resolves to a no-op and the engine is skipped. */
  effectiveSteps: number | null;
  seed: number;
  inputStrength: number;
  audioDuration: number;
  denoiseStrength: number;
  guidanceInterval: number;
  guidanceIntervalDecay: number;
  omegaScale: number;
  minGuidanceScale: number;
  retakeVariance: number;
  schedulerType: string;
  cfgType: string;
  useErgTag: boolean;
  useErgLyric: boolean;
  useErgDiffusion: boolean;
  taskType: string;
  thinking: boolean;
}

/** Parameters handed to the engine: effectiveSteps is always resolved. */
export type EngineParams = Omit<GenerationParams, "effectiveSteps"> & {
  effectiveSteps: number;
};

/**
 * Output of an engine call. Either mono samples or one array per channel.
 */
export type EngineOutput = Float32Array | Float32Array[];

/** The external generative model, already loaded onto a device. */
export interface InferenceEngine {
  infer(samples: Float32Array, sampleRate: number, params: EngineParams): Promise<EngineOutput>;
  dispose?(): Promise<void> | void;
}

export interface EngineLoadOptions {
  modelPath: string;
  device: DeviceKind;
  modelType: Exclude<ModelType, "unknown">;
}

export type EngineLoader = (options: EngineLoadOptions) => Promise<InferenceEngine>;

export type PassthroughReason = "model_unavailable" | "denoise_disabled";

export type ProcessResult =
  | { kind: "inferred"; buffer: AudioBuffer }
  | { kind: "passthrough"; reason: PassthroughReason; buffer: AudioBuffer }
  | { kind: "failed"; error: string; buffer: AudioBuffer };
