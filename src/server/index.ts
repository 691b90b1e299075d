import { config, envInfo } from "../shared/config.js";
import { createPool, ensureSchema } from "../shared/db.js";
import { createLogger } from "../shared/logger.js";
import { createPgRecordStore } from "../shared/store.js";
import { createApp } from "./app.js";
import { createRecordHandler } from "./handler.js";

const logger = createLogger(config.logLevel);

const start = async () => {
  if (envInfo.envFileExists) {
    logger.info({ envFile: envInfo.envPath }, "Loaded environment file");
  } else {
    logger.info(`No ${envInfo.envFile} found; using process environment`);
  }

  if (!config.dbUrl) {
    throw new Error("DATABASE_URL is required");
  }

  const pool = createPool(config.dbUrl, logger);
  await ensureSchema(pool, config.schemaPath);
  logger.info("Database tables ready");

  const handler = createRecordHandler({ store: createPgRecordStore(pool), logger });
  const app = createApp({
    handler,
    logger,
    corsOrigin: config.corsOrigin,
    bodyLimit: config.bodyLimit
  });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`API listening on http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, "Failed to close database pool");
          process.exit(1);
        }
      );
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

start().catch((error: unknown) => {
  logger.fatal({ err: error }, "Server failed to start");
  process.exit(1);
});
