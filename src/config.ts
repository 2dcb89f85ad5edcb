/**
 * Server configuration from command-line flags and BRIDGE_* environment
 * variables. Flags win over the environment.
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULT_HOST, DEFAULT_MAX_BODY_MB, DEFAULT_PORT } from "@/constants";
import { parseDeviceList } from "@/lib/devices";
import { describeError } from "@/lib/logger";
import { formatIssues } from "@/lib/schemas";
import type { DeviceKind, RequestedDevice } from "@/types/model";

export interface BridgeConfig {
  host: string;
  port: number;
  modelPath: string | null;
  device: RequestedDevice;
  engineModule: string | null;
  allowedDevices: DeviceKind[];
  allowUnsafeDevice: boolean;
  maxBodyBytes: number;
  debug: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const USAGE = `Usage: resonator-bridge [options]

  --host <addr>              Bind host (default: ${DEFAULT_HOST})
  --port <n>                 HTTP port (default: ${DEFAULT_PORT})
  --model-path <path>        Model directory or repository id
  --device <cpu|mps|cuda|auto>
                             Compute device (default: cpu)
  --engine-module <module>   Module exporting createEngine()
  --allowed-devices <list>   Devices "auto" and explicit requests may use
                             (default: cpu,cuda,mps)
  --allow-unsafe-device      Permit devices known to crash the engine (mps)
  --max-body-mb <n>          Largest accepted request body (default: ${DEFAULT_MAX_BODY_MB})
  --debug                    Verbose logging
  -h, --help                 Show this help
`;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? null : value))
  .nullable()
  .default(null);

const configSchema = z.object({
  host: z.string().min(1).default(DEFAULT_HOST),
  port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  modelPath: optionalString,
  device: z.enum(["cpu", "mps", "cuda", "auto"]).default("cpu"),
  engineModule: optionalString,
  allowedDevices: z
    .string()
    .default("cpu,cuda,mps")
    .transform((value, ctx) => {
      try {
        return parseDeviceList(value);
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(err) });
        return z.NEVER;
      }
    }),
  allowUnsafeDevice: z.boolean().default(false),
  maxBodyMb: z.coerce.number().positive().default(DEFAULT_MAX_BODY_MB),
  debug: z.boolean().default(false),
});

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function envString(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

export function wantsHelp(argv: string[]): boolean {
  return argv.includes("--help") || argv.includes("-h");
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        host: { type: "string" },
        port: { type: "string" },
        "model-path": { type: "string" },
        device: { type: "string" },
        "engine-module": { type: "string" },
        "allowed-devices": { type: "string" },
        "allow-unsafe-device": { type: "boolean" },
        "max-body-mb": { type: "string" },
        debug: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new ConfigError(describeError(err));
  }
}

export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const values = parseFlags(argv);

  const parsed = configSchema.safeParse({
    host: values.host ?? envString(env.BRIDGE_HOST),
    port: values.port ?? envString(env.BRIDGE_PORT),
    modelPath: values["model-path"] ?? envString(env.BRIDGE_MODEL_PATH),
    device: (values.device ?? envString(env.BRIDGE_DEVICE))?.toLowerCase(),
    engineModule: values["engine-module"] ?? envString(env.BRIDGE_ENGINE_MODULE),
    allowedDevices: values["allowed-devices"] ?? envString(env.BRIDGE_ALLOWED_DEVICES),
    allowUnsafeDevice: values["allow-unsafe-device"] ?? envFlag(env.BRIDGE_ALLOW_UNSAFE_DEVICE),
    maxBodyMb: values["max-body-mb"] ?? envString(env.BRIDGE_MAX_BODY_MB),
    debug: values.debug ?? envFlag(env.BRIDGE_DEBUG),
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const { maxBodyMb, ...rest } = parsed.data;
  return { ...rest, maxBodyBytes: Math.floor(maxBodyMb * 1024 * 1024) };
}
