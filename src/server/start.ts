import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { BRIDGE_VERSION } from "@/constants";
import type { BridgeConfig } from "@/config";
import type { DeviceProbe } from "@/lib/devices";
import { createLogger } from "@/lib/logger";
import { BridgeFacade } from "@/services/bridge-facade";
import { createModuleEngineLoader } from "@/services/engine-loader";
import { ModelManager } from "@/services/model-manager";
import type { EngineLoader } from "@/types/model";
import { createBridgeServer } from "./http-server";

export interface RunningBridge {
  server: Server;
  manager: ModelManager;
  address: AddressInfo;
  /** Stops accepting requests and releases the engine. Safe to call twice. */
  close: () => Promise<void>;
}

export interface StartBridgeDeps {
  loader?: EngineLoader;
  probe?: DeviceProbe;
  /** Called after a /shutdown request has closed the bridge. */
  onShutdown?: () => void;
}

function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error(`Unexpected listen address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}

export async function startBridge(config: BridgeConfig, deps: StartBridgeDeps = {}): Promise<RunningBridge> {
  const logger = createLogger("bridge", { debug: config.debug });

  logger.info(`Resonator bridge v${BRIDGE_VERSION} (device: ${config.device})`);

  const manager = new ModelManager({
    loader: deps.loader ?? createModuleEngineLoader(config.engineModule),
    devicePolicy: {
      allowedDevices: new Set(config.allowedDevices),
      allowUnsafeDevices: config.allowUnsafeDevice,
    },
    probe: deps.probe,
    logger: createLogger("model", { debug: config.debug }),
  });

  if (config.modelPath) {
    const state = await manager.load(config.modelPath, config.device);
    if (state.isLoaded) {
      logger.info(`Model ready on ${state.device}, neural inference active`);
    } else {
      logger.warn(`Model NOT loaded, running in passthrough mode. Reason: ${state.loadError}`);
    }
  } else {
    logger.warn("No model path given (--model-path); running in passthrough mode.");
  }

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    }).then(() => manager.dispose());
    return closing;
  };

  const server = createBridgeServer({
    facade: new BridgeFacade(manager),
    maxBodyBytes: config.maxBodyBytes,
    logger: createLogger("http", { debug: config.debug }),
    onShutdown: async () => {
      await close();
      deps.onShutdown?.();
    },
  });

  const address = await listen(server, config.port, config.host);
  logger.info(`Listening on http://${address.address}:${address.port}`);
  logger.debug("Routes: GET /health, GET /status, POST /infer, POST /shutdown");

  return { server, manager, address, close };
}
