import { config } from "./shared/config.js";
import { createPool, ensureSchema } from "./shared/db.js";
import { createLogger } from "./shared/logger.js";

const logger = createLogger(config.logLevel);

const run = async () => {
  if (!config.dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  const pool = createPool(config.dbUrl, logger);
  try {
    await ensureSchema(pool, config.schemaPath);
    logger.info({ schema: config.schemaPath }, "Schema applied.");
  } finally {
    await pool.end();
  }
};

run().catch((error: unknown) => {
  logger.error({ err: error }, "Migration failed");
  process.exitCode = 1;
});
