/**
 * Request handling for the bridge, independent of the HTTP transport:
 * validate → decode → map → process → encode.
 */

import { BRIDGE_VERSION, DEFAULT_BUFFER_SIZE, DEFAULT_SAMPLE_RATE } from "@/constants";
import { mapControls } from "@/lib/parameter-mapper";
import { formatIssues, inferRequestSchema, toControlKnobs } from "@/lib/schemas";
import { WavDecodeError, decodeWav, encodeWav } from "@/lib/wav-codec";
import type { ModelManager } from "@/services/model-manager";
import type { AudioBuffer, WavErrorCode } from "@/types/audio";
import type { HealthResponse, InferResponse, StatusResponse } from "@/types/bridge";

export type BridgeErrorCode =
  | WavErrorCode
  | "ValidationError"
  | "InvalidJson"
  | "PayloadTooLarge"
  | "NotFound"
  | "MethodNotAllowed";

/** A request failure the caller is told about, with its HTTP status. */
export class BridgeError extends Error {
  constructor(
    public code: BridgeErrorCode,
    public status: number,
    message: string,
  ) {
    super(message);
    this.name = "BridgeError";
  }
}

export interface BridgeFacadeOptions {
  /** Wall clock in ms, used for health timestamps and time-derived seeds. */
  now?: () => number;
  /** Monotonic clock in ms, used to time inference. */
  clock?: () => number;
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

export class BridgeFacade {
  private readonly now: () => number;
  private readonly clock: () => number;

  constructor(
    private readonly manager: ModelManager,
    options: BridgeFacadeOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.clock = options.clock ?? (() => performance.now());
  }

  health(): HealthResponse {
    const state = this.manager.getState();
    return {
      status: "ok",
      model_loaded: state.isLoaded,
      model_type: state.modelType,
      device: state.device,
      error: state.loadError,
      inference_count: state.inferenceCount,
      timestamp: this.now() / 1000,
    };
  }

  status(): StatusResponse {
    const state = this.manager.getState();
    return {
      status: "ok",
      model_loaded: state.isLoaded,
      model_type: state.modelType,
      model_path: state.modelPath,
      device: state.device,
      error: state.loadError,
      inference_count: state.inferenceCount,
      sample_rate: DEFAULT_SAMPLE_RATE,
      buffer_size: DEFAULT_BUFFER_SIZE,
      version: BRIDGE_VERSION,
    };
  }

  async infer(body: unknown): Promise<InferResponse> {
    const parsed = inferRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw new BridgeError("ValidationError", 400, formatIssues(parsed.error));
    }
    const request = parsed.data;

    let input: AudioBuffer;
    try {
      input = decodeWav(Buffer.from(request.audio, "base64"));
    } catch (err) {
      if (err instanceof WavDecodeError) {
        throw new BridgeError(err.code, 400, err.message);
      }
      throw err;
    }

    const params = mapControls(toControlKnobs(request), this.now());

    const started = this.clock();
    const result = await this.manager.process(input, params);
    const durationMs = this.clock() - started;

    return {
      audio: toBase64(encodeWav(result.buffer)),
      sample_rate: result.buffer.sampleRate,
      num_samples: result.buffer.samples.length,
      duration_ms: Math.round(durationMs * 100) / 100,
      model_used: result.kind === "inferred",
      model_type: this.manager.getState().modelType,
    };
  }
}
