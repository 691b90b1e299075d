import cors from "cors";
import express from "express";
import { pinoHttp } from "pino-http";
import { NotFoundError, StorageError, ValidationError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { toRecordJson } from "../shared/record.js";
import type { RecordHandler } from "./handler.js";

export type AppOptions = {
  handler: RecordHandler;
  logger: Logger;
  corsOrigin?: string[];
  bodyLimit?: string;
};

// Express 4 does not forward rejected promises to the error middleware on its own.
const asyncHandler =
  (fn: (req: express.Request, res: express.Response) => Promise<unknown>): express.RequestHandler =>
  (req, res, next) => {
    fn(req, res).catch(next);
  };

const bodyErrors: Record<string, { status: number; message: string }> = {
  "entity.parse.failed": { status: 400, message: "Malformed JSON body" },
  "entity.too.large": { status: 413, message: "Request body too large" },
  "charset.unsupported": { status: 415, message: "Unsupported request body encoding" },
  "encoding.unsupported": { status: 415, message: "Unsupported request body encoding" }
};

// body-parser rejections carry a `type` and a client-facing 4xx `status`.
const bodyErrorFor = (error: unknown) => {
  if (!(error instanceof Error) || !("type" in error) || typeof error.type !== "string") return null;
  const known = bodyErrors[error.type];
  if (known) return known;
  if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 500) {
    return { status: error.status, message: "Malformed request body" };
  }
  return null;
};

const statusFor = (error: unknown) => {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof StorageError) return 500;
  return null;
};

export const createApp = ({ handler, logger, corsOrigin = [], bodyLimit = "1mb" }: AppOptions) => {
  const app = express();
  app.disable("x-powered-by");
  app.use(pinoHttp({ logger }));
  app.use(cors({ origin: corsOrigin.length > 0 ? corsOrigin : true }));
  app.use(express.json({ limit: bodyLimit }));

  app.get("/", (_req, res) => {
    res.status(200).json({
      status: "OK",
      message: "Records API is running",
      timestamp: new Date().toISOString()
    });
  });

  app.get(
    "/api/records",
    asyncHandler(async (_req, res) => {
      const { records, total } = await handler.list();
      res.status(200).json({ records: records.map(toRecordJson), total });
    })
  );

  app.post(
    "/api/records",
    asyncHandler(async (req, res) => {
      const record = await handler.create(req.body);
      res.status(201).json(toRecordJson(record));
    })
  );

  app.put(
    "/api/records/:id(\\d+)",
    asyncHandler(async (req, res) => {
      const record = await handler.update(req.params.id, req.body);
      res.status(200).json({ message: "Record updated successfully", record: toRecordJson(record) });
    })
  );

  app.delete(
    "/api/records/:id(\\d+)",
    asyncHandler(async (req, res) => {
      await handler.remove(req.params.id);
      res.status(200).json({ message: "Record deleted successfully" });
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Endpoint not found" });
  });

  const errorHandler: express.ErrorRequestHandler = (error, _req, res, _next) => {
    const bodyError = bodyErrorFor(error);
    if (bodyError) {
      res.status(bodyError.status).json({ error: bodyError.message });
      return;
    }
    const status = statusFor(error);
    if (status !== null && error instanceof Error) {
      res.status(status).json({ error: error.message });
      return;
    }
    logger.error({ err: error }, "Unhandled request error");
    res.status(500).json({ error: "Internal server error" });
  };
  app.use(errorHandler);

  return app;
};
