import { pino, stdTimeFunctions, type LevelWithSilent, type Logger } from "pino";

export type { Logger };

export const createLogger = (level: LevelWithSilent = "info"): Logger =>
  pino({
    name: "records-api",
    level,
    timestamp: stdTimeFunctions.isoTime
  });
