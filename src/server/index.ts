import { loadConfig } from "../config.js";
import { createAppContext } from "../context.js";
import { closeConnection, db } from "../db/connection.js";
import { serverLogger } from "../logger.js";
import { buildServer } from "./app.js";

/**
 * Start the API and the reconciliation scheduler; both stop on SIGINT/SIGTERM
 */
export async function startServer(): Promise<void> {
  const config = loadConfig();
  const context = createAppContext(config, db);
  const app = await buildServer(context);

  const shutdown = async (signal: string) => {
    serverLogger.info({ signal }, "Shutting down");
    try {
      await context.scheduler.stop();
      await app.close();
      await closeConnection();
    } catch (error) {
      serverLogger.error({ error }, "Error during shutdown");
      process.exitCode = 1;
    }
  };

  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));

  const { port, host } = config.server;
  await app.listen({ port, host });
  app.log.info({ host, port }, "Server started");

  context.scheduler.start(config.sync.intervalMs, {
    runImmediately: config.sync.onStart,
  });
}

const isMainModule =
  process.argv[1]?.endsWith("server/index.ts") === true ||
  process.argv[1]?.endsWith("server/index.js") === true;

if (isMainModule) {
  try {
    await startServer();
  } catch (err) {
    serverLogger.error({ err }, "Failed to start server");
    process.exit(1);
  }
}
