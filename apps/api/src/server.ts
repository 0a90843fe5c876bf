import { buildServer } from "./app.js";
import { ConfigError, loadConfig } from "./config.js";
import type { ApiConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { formatDuration } from "./utils/duration.js";

async function main() {
  let config: ApiConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger("ratewarden").error({ issues: err.issues }, "Invalid configuration");
      process.exit(1);
    }
    throw err;
  }

  const log = createLogger("ratewarden", config.logLevel);

  let server: Awaited<ReturnType<typeof buildServer>>;
  try {
    server = await buildServer({ config });
  } catch (err) {
    log.error({ err }, "Failed to build server");
    process.exit(1);
  }

  const SHUTDOWN_TIMEOUT_MS = 10_000;

  // Drain connections on SIGTERM/SIGINT
  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down gracefully`);

    // Hard timeout: force exit if close doesn't complete in time
    const forceTimer = setTimeout(() => {
      server.log.warn(`Shutdown did not complete within ${SHUTDOWN_TIMEOUT_MS}ms, forcing exit`);
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceTimer.unref();

    try {
      await server.close();
    } catch (err) {
      server.log.error({ err }, "Error during graceful shutdown");
    }
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  try {
    await server.listen({ port: config.port, host: config.host });
    server.log.info(
      {
        host: config.host,
        port: config.port,
        store: config.redis.url ? "redis" : "memory",
        requestLimit: config.defaultScope.requestLimit,
        window: formatDuration(config.defaultScope.windowMs),
        blockTime: formatDuration(config.defaultScope.blockMs),
      },
      "Ratewarden API server listening",
    );
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

void main();
