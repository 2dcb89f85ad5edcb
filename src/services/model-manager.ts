/**
 * Owns the inference engine and its availability state.
 *
 * The manager never throws on the request path: an engine that cannot be
 * loaded, or that fails during a call, turns into a passthrough result.
 * Engine calls are serialized; the engine is treated as non-reentrant.
 */

import { resolveDevice, systemDeviceProbe } from "@/lib/devices";
import type { DevicePolicy, DeviceProbe } from "@/lib/devices";
import { createLogger, describeError } from "@/lib/logger";
import type { Logger } from "@/lib/logger";
import { mixToMono } from "@/lib/mixdown";
import { SerialLock } from "@/lib/serial-lock";
import { createModelStore, selectModelState } from "@/stores/model-store";
import type { ModelStore } from "@/stores/model-store";
import type { AudioBuffer } from "@/types/audio";
import type {
  EngineLoader,
  GenerationParams,
  InferenceEngine,
  ModelState,
  ModelType,
  ProcessResult,
  RequestedDevice,
} from "@/types/model";

const MODEL_TYPE_KEYWORDS: readonly Exclude<ModelType, "unknown">[] = ["turbo", "sft", "base"];

/** Keyword scan of the model path; "base" when nothing matches. */
export function detectModelType(modelPath: string): Exclude<ModelType, "unknown"> {
  const lower = modelPath.toLowerCase();
  return MODEL_TYPE_KEYWORDS.find((keyword) => lower.includes(keyword)) ?? "base";
}

export interface ModelManagerOptions {
  loader: EngineLoader;
  devicePolicy: DevicePolicy;
  probe?: DeviceProbe;
  logger?: Logger;
  store?: ModelStore;
}

interface LoadRequest {
  modelPath: string;
  device: RequestedDevice;
}

export class ModelManager {
  private readonly store: ModelStore;
  private readonly loader: EngineLoader;
  private readonly devicePolicy: DevicePolicy;
  private readonly probe: DeviceProbe;
  private readonly logger: Logger;

  private engine: InferenceEngine | null = null;
  private readonly engineLock = new SerialLock();
  private pendingLoad: Promise<ModelState> | null = null;
  private lastRequest: LoadRequest | null = null;

  constructor(options: ModelManagerOptions) {
    this.loader = options.loader;
    this.devicePolicy = options.devicePolicy;
    this.probe = options.probe ?? systemDeviceProbe;
    this.logger = options.logger ?? createLogger("model");
    this.store = options.store ?? createModelStore();
  }

  getState(): ModelState {
    return selectModelState(this.store.getState());
  }

  subscribe(listener: (state: ModelState) => void): () => void {
    return this.store.subscribe((state) => listener(selectModelState(state)));
  }

  /** Engine calls queued or running. */
  get pendingInferences(): number {
    return this.engineLock.pending;
  }

  /**
   * Attempts to load the model. Failure is recorded in state, not thrown.
   * A call made while another load is in flight resolves with that load's
   * outcome.
   */
  load(modelPath: string, device: RequestedDevice): Promise<ModelState> {
    if (this.pendingLoad) {
      this.logger.debug("Load already in progress; waiting for it");
      return this.pendingLoad;
    }

    this.lastRequest = { modelPath, device };
    // Shares the engine lock so a swap never lands mid-inference.
    const attempt = this.engineLock
      .run(() => this.attemptLoad(modelPath, device))
      .finally(() => {
        this.pendingLoad = null;
      });
    this.pendingLoad = attempt;
    return attempt;
  }

  /** Repeats the last load request. */
  reload(): Promise<ModelState> {
    if (!this.lastRequest) {
      return Promise.reject(new Error("reload() called before any load attempt"));
    }
    return this.load(this.lastRequest.modelPath, this.lastRequest.device);
  }

  private async attemptLoad(modelPath: string, requested: RequestedDevice): Promise<ModelState> {
    const modelType = detectModelType(modelPath);
    const { device, fallbackReason } = resolveDevice(requested, this.devicePolicy, this.probe);

    this.logger.info(`Detected model type: ${modelType}`);
    if (fallbackReason) {
      this.logger.warn(`Not using requested device: ${fallbackReason}. Falling back to ${device}.`);
    }
    this.logger.info(`Resolved target device: ${device} (requested ${requested})`);

    await this.releaseEngine();

    try {
      this.engine = await this.loader({ modelPath, device, modelType });
      this.store.getState().setLoaded({ modelPath, device, modelType });
      this.logger.info(`Model loaded on ${device} (type: ${modelType})`);
    } catch (err) {
      const reason = `Model load failed: ${describeError(err)}`;
      this.store.getState().setLoadFailed({ modelPath, modelType, error: reason });
      this.logger.warn(`${reason}. Continuing in passthrough mode.`);
    }

    return this.getState();
  }

  /**
   * Runs one buffer through the engine, or hands it back untouched when the
   * engine is unavailable, the request is a no-op, or the engine fails.
   */
  async process(buffer: AudioBuffer, params: GenerationParams): Promise<ProcessResult> {
    if (!this.store.getState().isLoaded) {
      return { kind: "passthrough", reason: "model_unavailable", buffer };
    }
    const effectiveSteps = params.effectiveSteps;
    if (effectiveSteps === null) {
      return { kind: "passthrough", reason: "denoise_disabled", buffer };
    }

    return this.engineLock.run(async (): Promise<ProcessResult> => {
      // A reload may have run while this call was queued.
      const engine = this.engine;
      if (!engine || !this.store.getState().isLoaded) {
        return { kind: "passthrough", reason: "model_unavailable", buffer };
      }

      this.logger.info(
        `Inference: steps=${effectiveSteps} (denoise=${params.denoiseStrength.toFixed(2)}), ` +
          `cfg=${params.guidanceScale}, strength=${params.inputStrength}, omega=${params.omegaScale}, ` +
          `interval=${params.guidanceInterval}, decay=${params.guidanceIntervalDecay}, ` +
          `retake_var=${params.retakeVariance}, seed=${params.seed}`,
      );

      try {
        const output = await engine.infer(buffer.samples, buffer.sampleRate, {
          ...params,
          effectiveSteps,
        });
        const samples = mixToMono(output);
        this.store.getState().incrementInferenceCount();
        return { kind: "inferred", buffer: { samples, sampleRate: buffer.sampleRate } };
      } catch (err) {
        this.logger.error("Inference failed, returning input unchanged:", err);
        return { kind: "failed", error: describeError(err), buffer };
      }
    });
  }

  /** Releases the engine and returns the state to unloaded. */
  async dispose(): Promise<void> {
    await this.engineLock.run(async () => {
      await this.releaseEngine();
      this.store.getState().reset();
    });
  }

  private async releaseEngine(): Promise<void> {
    const engine = this.engine;
    this.engine = null;
    if (!engine?.dispose) return;
    try {
      await engine.dispose();
    } catch (err) {
      this.logger.warn("Engine dispose failed:", err);
    }
  }
}
