import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";
import type { DeviceKind, ModelState, ModelType } from "@/types/model";

interface LoadedInfo {
  modelPath: string;
  device: DeviceKind;
  modelType: ModelType;
}

interface FailedInfo {
  modelPath: string;
  modelType: ModelType;
  error: string;
}

export interface ModelStoreState extends ModelState {
  // Each transition is a single set() so readers never see a half-applied load.
  setLoaded: (info: LoadedInfo) => void;
  setLoadFailed: (info: FailedInfo) => void;
  incrementInferenceCount: () => void;
  reset: () => void;
}

export type ModelStore = StoreApi<ModelStoreState>;

export const initialModelState: ModelState = {
  status: "unloaded",
  isLoaded: false,
  device: "none",
  modelType: "unknown",
  modelPath: null,
  loadError: null,
  inferenceCount: 0,
};

export function createModelStore(): ModelStore {
  return createStore<ModelStoreState>()((set) => ({
    ...initialModelState,

    setLoaded: ({ modelPath, device, modelType }) =>
      set({
        status: "loaded",
        isLoaded: true,
        device,
        modelType,
        modelPath,
        loadError: null,
        inferenceCount: 0,
      }),

    setLoadFailed: ({ modelPath, modelType, error }) =>
      set({
        status: "error",
        isLoaded: false,
        device: "none",
        modelType,
        modelPath,
        loadError: error,
        inferenceCount: 0,
      }),

    incrementInferenceCount: () => set((state) => ({ inferenceCount: state.inferenceCount + 1 })),

    reset: () => set({ ...initialModelState }),
  }));
}

/** Plain snapshot without the actions. */
export function selectModelState(state: ModelStoreState): ModelState {
  return {
    status: state.status,
    isLoaded: state.isLoaded,
    device: state.device,
    modelType: state.modelType,
    modelPath: state.modelPath,
    loadError: state.loadError,
    inferenceCount: state.inferenceCount,
  };
}
