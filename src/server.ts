/**
 * Server entry point.
 *
 * Thin shell: context creation, listen, graceful shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { createContext } from "./app/context";
import { createApp } from "./app/http";

const ctx = createContext();
const { logger, db, config } = ctx;

const app = createApp(ctx);

const host = process.env.BIND_HOST || "0.0.0.0";
const server = app.listen(config.port, host, () => {
  logger.info({ port: config.port, host }, "sightings service listening");
});

let shuttingDown = false;

const shutdown = (signal: NodeJS.Signals) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");

  const forceExit = setTimeout(() => {
    logger.error("Graceful shutdown timed out, forcing exit");
    process.exit(1);
  }, config.gracefulShutdownMs);
  forceExit.unref();

  server.close((err) => {
    if (err) {
      logger.error({ err }, "HTTP server close failed");
    }
    db.close();
    logger.info("Shutdown complete");
    process.exit(err ? 1 : 0);
  });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
