export type { AudioBuffer, WavInfo, WavErrorCode, EuclideanSeedOptions } from "./audio";
export { WavFormatCode } from "./audio";
export type {
  DeviceKind,
  RequestedDevice,
  DeviceState,
  ModelType,
  ModelStatus,
  ModelState,
  InferMethod,
  GenerationParams,
  EngineParams,
  EngineOutput,
  InferenceEngine,
  EngineLoadOptions,
  EngineLoader,
  PassthroughReason,
  ProcessResult,
} from "./model";
export type * from "./bridge";
