/**
 * zod schemas for everything that crosses the HTTP boundary.
 */

import { z } from "zod";
import { INFER_DEFAULTS } from "@/constants";
import type { ControlKnobs } from "@/lib/parameter-mapper";
import type {
  ErrorResponse,
  HealthResponse,
  InferResponse,
  ShutdownResponse,
  StatusResponse,
} from "@/types/bridge";

// Line breaks and surrounding whitespace are allowed; the decoder skips them.
const BASE64_PATTERN = /^[A-Za-z0-9+/\s]*={0,2}\s*$/;

const finite = () => z.number().finite();

export const inferRequestSchema = z.object({
  audio: z
    .string({ required_error: 'Missing "audio" field (base64-encoded WAV)' })
    .min(1, '"audio" must not be empty')
    .regex(BASE64_PATTERN, '"audio" must be base64-encoded'),
  prompt: z.string().default(INFER_DEFAULTS.prompt),
  guidance_scale: finite().default(INFER_DEFAULTS.guidanceScale),
  num_steps: z.number().int().min(1).max(1000).default(INFER_DEFAULTS.numSteps),
  seed: z.number().int().default(INFER_DEFAULTS.seed),
  input_strength: finite().default(INFER_DEFAULTS.inputStrength),
  shift: finite().default(INFER_DEFAULTS.shift),
  infer_method: z.string().default(INFER_DEFAULTS.inferMethod),
  entropy: finite().default(INFER_DEFAULTS.entropy),
  granularity: finite().default(INFER_DEFAULTS.granularity),
  audio_duration: finite().nonnegative().default(INFER_DEFAULTS.audioDuration),
  denoise_strength: finite().default(INFER_DEFAULTS.denoiseStrength),
  task_type: z.string().default(INFER_DEFAULTS.taskType),
  thinking: z.boolean().default(INFER_DEFAULTS.thinking),
});

export type InferRequest = z.infer<typeof inferRequestSchema>;

export function toControlKnobs(request: InferRequest): ControlKnobs {
  return {
    prompt: request.prompt,
    guidanceScale: request.guidance_scale,
    numSteps: request.num_steps,
    seed: request.seed,
    inputStrength: request.input_strength,
    shift: request.shift,
    inferMethod: request.infer_method,
    entropy: request.entropy,
    granularity: request.granularity,
    audioDuration: request.audio_duration,
    denoiseStrength: request.denoise_strength,
    taskType: request.task_type,
    thinking: request.thinking,
  };
}

/** "field: message; field: message" */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// --- Responses, as read back by the client ---

const modelTypeSchema = z.enum(["turbo", "sft", "base", "unknown", "none"]);
const deviceSchema = z.enum(["cpu", "mps", "cuda", "auto", "none"]);

export const healthResponseSchema: z.ZodType<HealthResponse> = z.object({
  status: z.string(),
  model_loaded: z.boolean(),
  model_type: modelTypeSchema,
  device: deviceSchema,
  error: z.string().nullable(),
  inference_count: z.number().int(),
  timestamp: z.number(),
});

export const statusResponseSchema: z.ZodType<StatusResponse> = z.object({
  status: z.string(),
  model_loaded: z.boolean(),
  model_type: modelTypeSchema,
  model_path: z.string().nullable(),
  device: deviceSchema,
  error: z.string().nullable(),
  inference_count: z.number().int(),
  sample_rate: z.number().int(),
  buffer_size: z.number().int(),
  version: z.string(),
});

export const inferResponseSchema: z.ZodType<InferResponse> = z.object({
  audio: z.string(),
  sample_rate: z.number().int(),
  num_samples: z.number().int(),
  duration_ms: z.number(),
  model_used: z.boolean(),
  model_type: z.enum(["turbo", "sft", "base", "unknown"]),
});

export const shutdownResponseSchema: z.ZodType<ShutdownResponse> = z.object({
  status: z.literal("shutting_down"),
});

export const errorResponseSchema: z.ZodType<ErrorResponse> = z.object({ error: z.string() });
