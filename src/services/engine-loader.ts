/**
 * Resolves the external inference engine.
 *
 * The engine lives in a separately installed module that exports
 * `createEngine(options)`. Nothing here knows how the model works; a module
 * that is missing or misshapen is reported as a load failure.
 */

import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { describeError } from "@/lib/logger";
import type {
  EngineLoadOptions,
  EngineLoader,
  EngineOutput,
  EngineParams,
  InferenceEngine,
} from "@/types/model";

export class EngineLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineLoadError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function toModuleUrl(specifier: string): string {
  if (specifier.startsWith(".") || isAbsolute(specifier)) {
    return pathToFileURL(resolve(specifier)).href;
  }
  return specifier;
}

/** Checks what an untyped engine handed back before anything else sees it. */
export function coerceEngineOutput(value: unknown): EngineOutput {
  if (value instanceof Float32Array) return value;
  if (Array.isArray(value)) {
    if (value.every((ch): ch is Float32Array => ch instanceof Float32Array)) return value;
    if (value.every((n): n is number => typeof n === "number")) return Float32Array.from(value);
  }
  throw new TypeError("Engine output must be a Float32Array or an array of Float32Array channels");
}

/** Wraps an untyped engine object in the typed InferenceEngine contract. */
export function adaptEngine(value: unknown): InferenceEngine {
  if (!isRecord(value) || typeof value.infer !== "function") {
    throw new EngineLoadError("createEngine() did not return an object with an infer() method");
  }
  const target = value;
  const infer = value.infer;
  const dispose = value.dispose;

  const engine: InferenceEngine = {
    async infer(samples: Float32Array, sampleRate: number, params: EngineParams) {
      const output: unknown = await infer.call(target, samples, sampleRate, params);
      return coerceEngineOutput(output);
    },
  };
  if (typeof dispose === "function") {
    engine.dispose = async () => {
      await dispose.call(target);
    };
  }
  return engine;
}

/**
 * Loader backed by a dynamically imported module. A null specifier means no
 * engine is installed, which fails every load attempt.
 */
export function createModuleEngineLoader(specifier: string | null): EngineLoader {
  return async (options: EngineLoadOptions) => {
    if (!specifier) {
      throw new EngineLoadError(
        "No inference engine module configured. Set --engine-module or BRIDGE_ENGINE_MODULE.",
      );
    }

    let mod: unknown;
    try {
      mod = await import(toModuleUrl(specifier));
    } catch (err) {
      throw new EngineLoadError(
        `Inference engine module "${specifier}" could not be imported: ${describeError(err)}`,
      );
    }

    if (!isRecord(mod) || typeof mod.createEngine !== "function") {
      throw new EngineLoadError(`Module "${specifier}" does not export createEngine()`);
    }
    const created: unknown = await mod.createEngine(options);
    return adaptEngine(created);
  };
}
