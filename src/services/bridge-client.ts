/**
 * HTTP client for the bridge server, for host applications written in
 * TypeScript. Connection status is kept in a store so callers can
 * subscribe to it.
 */

import type { z } from "zod";
import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_SAMPLE_RATE,
  HEALTH_POLL_INTERVAL_MS,
  HEALTH_TIMEOUT_MS,
  INFER_TIMEOUT_MS,
} from "@/constants";
import { createLogger, describeError } from "@/lib/logger";
import type { Logger } from "@/lib/logger";
import {
  errorResponseSchema,
  healthResponseSchema,
  inferResponseSchema,
  shutdownResponseSchema,
  statusResponseSchema,
} from "@/lib/schemas";
import { decodeWav, encodeWav } from "@/lib/wav-codec";
import { createBridgeStore } from "@/stores/bridge-store";
import type { BridgeStore } from "@/stores/bridge-store";
import type { AudioBuffer, InferMethod, ShutdownResponse, StatusResponse } from "@/types";

export type ApiErrorReason = "http" | "decode" | "not_connected";

export class ApiError extends Error {
  constructor(
    public status: number,
    message: string,
    public reason: ApiErrorReason = "http",
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export interface ClientInferOptions {
  sampleRate?: number;
  prompt?: string;
  guidanceScale?: number;
  numSteps?: number;
  seed?: number;
  inputStrength?: number;
  entropy?: number;
  granularity?: number;
  taskType?: string;
  thinking?: boolean;
  shift?: number;
  inferMethod?: InferMethod;
  denoiseStrength?: number;
}

export interface BridgeClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
  store?: BridgeStore;
  healthIntervalMs?: number;
  healthTimeoutMs?: number;
  inferTimeoutMs?: number;
  /** Monotonic clock in ms for latency measurement. */
  clock?: () => number;
  logger?: Logger;
}

export class BridgeClient {
  readonly store: BridgeStore;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly healthIntervalMs: number;
  private readonly healthTimeoutMs: number;
  private readonly inferTimeoutMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private healthTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: BridgeClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? `http://${DEFAULT_HOST}:${DEFAULT_PORT}`).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.store = options.store ?? createBridgeStore();
    this.healthIntervalMs = options.healthIntervalMs ?? HEALTH_POLL_INTERVAL_MS;
    this.healthTimeoutMs = options.healthTimeoutMs ?? HEALTH_TIMEOUT_MS;
    this.inferTimeoutMs = options.inferTimeoutMs ?? INFER_TIMEOUT_MS;
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger ?? createLogger("bridge-client");
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T>,
    timeoutMs: number,
    init?: RequestInit,
  ): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => null);
      const parsedError = errorResponseSchema.safeParse(body);
      throw new ApiError(
        response.status,
        parsedError.success ? parsedError.data.error : `HTTP ${response.status}`,
      );
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ApiError(response.status, `Response decoding failed: ${parsed.error.message}`, "decode");
    }
    return parsed.data;
  }

  // --- Health ---

  /** Polls /health once and records the outcome in the store. Never throws. */
  async checkHealth(): Promise<void> {
    const state = this.store.getState();
    state.setConnecting();

    try {
      const health = await this.request("/health", healthResponseSchema, this.healthTimeoutMs);
      this.store.getState().applyHealth(health);
    } catch (err) {
      if (err instanceof ApiError && err.reason === "http") {
        this.store.getState().setError(`Server returned ${err.status}: ${err.message}`);
      } else {
        this.store.getState().setDisconnected(describeError(err));
      }
    }
  }

  startHealthPolling(): void {
    this.stopHealthPolling();
    void this.checkHealth();
    this.healthTimer = setInterval(() => {
      void this.checkHealth();
    }, this.healthIntervalMs);
    this.healthTimer.unref();
  }

  stopHealthPolling(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }

  async getStatus(): Promise<StatusResponse> {
    return this.request("/status", statusResponseSchema, this.healthTimeoutMs);
  }

  // --- Inference ---

  /**
   * Sends one buffer through the bridge. Fields left out of `options` take
   * the server's defaults.
   */
  async infer(samples: Float32Array, options: ClientInferOptions = {}): Promise<AudioBuffer> {
    const { status } = this.store.getState();
    if (status !== "connected" && status !== "model_loaded") {
      throw new ApiError(0, "Bridge server not connected", "not_connected");
    }

    const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    const wav = encodeWav({ samples, sampleRate });

    // Ask for output matching the input length.
    const body = {
      audio: Buffer.from(wav.buffer, wav.byteOffset, wav.byteLength).toString("base64"),
      prompt: options.prompt,
      guidance_scale: options.guidanceScale,
      num_steps: options.numSteps,
      seed: options.seed,
      input_strength: options.inputStrength,
      entropy: options.entropy,
      granularity: options.granularity,
      task_type: options.taskType,
      thinking: options.thinking,
      shift: options.shift,
      infer_method: options.inferMethod,
      audio_duration: samples.length / sampleRate,
      denoise_strength: options.denoiseStrength,
    };

    const started = this.clock();
    const response = await this.request("/infer", inferResponseSchema, this.inferTimeoutMs, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
    const latencyMs = this.clock() - started;

    let output: AudioBuffer;
    try {
      output = decodeWav(Buffer.from(response.audio, "base64"));
    } catch (err) {
      throw new ApiError(200, `Invalid audio in response: ${describeError(err)}`, "decode");
    }

    this.store.getState().recordInference(latencyMs, response.model_used);
    this.logger.debug(`infer: ${response.num_samples} samples in ${latencyMs.toFixed(1)}ms`);
    return output;
  }

  // --- Lifecycle ---

  async shutdown(): Promise<ShutdownResponse> {
    const response = await this.request("/shutdown", shutdownResponseSchema, this.healthTimeoutMs, {
      method: "POST",
    });
    this.stopHealthPolling();
    this.store.getState().setDisconnected(null);
    return response;
  }
}
