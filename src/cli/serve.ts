import { ConfigError, USAGE, loadConfig, wantsHelp } from "@/config";
import { createLogger } from "@/lib/logger";
import { startBridge } from "@/server/start";

const logger = createLogger("bridge");

async function main(argv: string[]): Promise<void> {
  if (wantsHelp(argv)) {
    console.info(USAGE);
    return;
  }

  const config = loadConfig(argv);
  const bridge = await startBridge(config, {
    onShutdown: () => logger.info("Bridge stopped"),
  });

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    bridge.close().catch((err: unknown) => {
      logger.error("Shutdown failed:", err);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`${err.message}\n\n${USAGE}`);
  } else {
    logger.error("Failed to start:", err);
  }
  process.exitCode = 1;
});
