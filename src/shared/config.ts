import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import type { LevelWithSilent } from "pino";

const isProdEnv = process.env.RECORDS_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

const logLevels: LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

const parseLogLevel = (value: string | undefined): LevelWithSilent => {
  const fallback: LevelWithSilent = process.env.DEBUG === "true" ? "debug" : "info";
  if (!value) return fallback;
  const level = logLevels.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new Error(`Invalid LOG_LEVEL: ${value}`);
  }
  return level;
};

const parseCorsOrigin = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

export const config = {
  port: Number(process.env.PORT ?? 5000),
  host: process.env.HOST ?? "0.0.0.0",
  dbUrl:
    process.env.DATABASE_URL ??
    process.env.POSTGRES_URL ??
    process.env.POSTGRES_URL_NON_POOLING ??
    "",
  corsOrigin: parseCorsOrigin(process.env.CORS_ORIGIN),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  bodyLimit: process.env.BODY_LIMIT ?? "1mb",
  schemaPath: path.resolve(process.cwd(), process.env.SCHEMA_PATH ?? path.join("data", "schema.sql"))
};
