import fs from "fs";
import pg from "pg";
import type { Logger } from "./logger.js";

const { Pool } = pg;

const getSslConfig = (dbUrl: string): pg.PoolConfig["ssl"] | undefined => {
  let sslMode = process.env.DATABASE_SSLMODE ?? process.env.PGSSLMODE ?? "";

  try {
    const url = new URL(dbUrl);
    sslMode = sslMode || url.searchParams.get("sslmode") || "";
  } catch {
    // Not a URL (e.g. a libpq keyword string); rely on the env only.
  }

  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

export const createPool = (dbUrl: string, logger: Logger): pg.Pool => {
  if (!dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  const pool = new Pool({
    connectionString: dbUrl,
    ssl: getSslConfig(dbUrl)
  });
  // pg-pool re-emits errors from idle clients here (e.g. after a server restart).
  pool.on("error", (error) => {
    logger.error({ err: error }, "Idle database client failed");
  });
  return pool;
};

export const ensureSchema = async (pool: pg.Pool, schemaPath: string) => {
  const schema = await fs.promises.readFile(schemaPath, "utf-8");
  await pool.query(schema);
};
