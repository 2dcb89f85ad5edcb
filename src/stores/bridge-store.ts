import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";
import type { BridgeConnectionStatus, HealthResponse } from "@/types/bridge";

interface BridgeState {
  status: BridgeConnectionStatus;
  isModelLoaded: boolean;
  remoteDevice: string;
  remoteModelType: string;
  lastError: string | null;
  remoteInferenceCount: number;
  /** Round trip of the last inference call. */
  lastLatencyMs: number;

  setConnecting: () => void;
  applyHealth: (health: HealthResponse) => void;
  setDisconnected: (error: string | null) => void;
  setError: (error: string) => void;
  recordInference: (latencyMs: number, modelUsed: boolean) => void;
  reset: () => void;
}

export type BridgeStore = StoreApi<BridgeState>;

type BridgeData = Pick<
  BridgeState,
  "status" | "isModelLoaded" | "remoteDevice" | "remoteModelType" | "lastError" | "remoteInferenceCount" | "lastLatencyMs"
>;

const initialState: BridgeData = {
  status: "disconnected",
  isModelLoaded: false,
  remoteDevice: "none",
  remoteModelType: "none",
  lastError: null,
  remoteInferenceCount: 0,
  lastLatencyMs: 0,
};

export function createBridgeStore(): BridgeStore {
  return createStore<BridgeState>()((set, get) => ({
    ...initialState,

    setConnecting: () => {
      // Only the first contact shows as connecting; later polls keep the last status.
      if (get().status === "disconnected") set({ status: "connecting" });
    },

    applyHealth: (health) =>
      set({
        status: health.model_loaded ? "model_loaded" : "connected",
        isModelLoaded: health.model_loaded,
        remoteDevice: health.device,
        remoteModelType: health.model_type,
        lastError: health.error,
        remoteInferenceCount: health.inference_count,
      }),

    setDisconnected: (error) => set({ status: "disconnected", lastError: error, isModelLoaded: false }),

    setError: (error) => set({ status: "error", lastError: error, isModelLoaded: false }),

    recordInference: (latencyMs, modelUsed) =>
      set(
        modelUsed
          ? { lastLatencyMs: latencyMs, isModelLoaded: true, status: "model_loaded" }
          : { lastLatencyMs: latencyMs },
      ),

    reset: () => set({ ...initialState }),
  }));
}
