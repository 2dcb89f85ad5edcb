import type { DeviceState, ModelType } from "./model";

// Wire shapes for the bridge's HTTP surface. Field names follow the JSON.

export interface HealthResponse {
  status: string;
  model_loaded: boolean;
  model_type: ModelType | "none";
  device: DeviceState;
  error: string | null;
  inference_count: number;
  timestamp: number;
}

export interface StatusResponse {
  status: string;
  model_loaded: boolean;
  model_type: ModelType | "none";
  model_path: string | null;
  device: DeviceState;
  error: string | null;
  inference_count: number;
  sample_rate: number;
  buffer_size: number;
  version: string;
}

export interface InferResponse {
  audio: string;
  sample_rate: number;
  num_samples: number;
  duration_ms: number;
  model_used: boolean;
  model_type: ModelType;
}

export interface ShutdownResponse {
  status: "shutting_down";
}

export interface ErrorResponse {
  error: string;
}

export type BridgeConnectionStatus =
  | "disconnected"
  | "connecting"
  | "connected"
  | "model_loaded"
  | "error";
