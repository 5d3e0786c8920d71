import { loadConfig } from "./config/index.js";
import { createTypingApi } from "./http/routes.js";
import { createTypingServer } from "./http/server.js";
import { createLogger } from "./observability/logger.js";
import { TypingStore } from "./typing/store.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger("TypingAPI", config.logging.level);
  const store = new TypingStore();
  const handler = createTypingApi({ store, config, logger });
  const server = createTypingServer(handler, {
    maxBodyBytes: config.http.maxBodyBytes,
    corsOrigin: config.http.corsOrigin,
    logger,
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.http.port, config.http.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  logger.info("listening", { host: config.http.host, port: config.http.port });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info("shutdown", { signal, sessions: store.size });
    server.close((error) => {
      if (error) {
        logger.error("shutdown_failed", { message: error.message });
        process.exitCode = 1;
      }
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

void main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
