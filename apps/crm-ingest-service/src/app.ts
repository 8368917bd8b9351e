import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { IngestStores } from "./db/store";
import { createIngestRouter } from "./routes/ingest";

/**
 * Build the HTTP app around a set of stores
 */
export function createApp(stores: IngestStores) {
  const app = express();

  // Middleware
  app.use(cors());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Mount routes
  app.use("/ingest", createIngestRouter(stores));

  // Body parser failures (malformed JSON, oversized payloads)
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isHttpError(err)) {
      return res.status(err.status).json({ error: err.message });
    }
    next(err);
  });

  return app;
}

function isHttpError(err: unknown): err is { status: number; message: string } {
  if (typeof err !== "object" || err === null) return false;
  if (!("status" in err) || !("message" in err)) return false;
  return typeof err.status === "number" && err.status >= 400 && err.status < 500 && typeof err.message === "string";
}
