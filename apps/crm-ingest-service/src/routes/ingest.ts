import express, { Router, Request, Response } from "express";
import { config } from "../config";
import { IngestStores } from "../db/store";
import { AccountNotFoundError } from "../errors";
import { ingestPayload } from "../services/ingest";
import { JsonObject } from "../types/ingest";

/**
 * POST /ingest/:apiKey
 * Webhook entry point; the API key in the path selects the account
 */
export function createIngestRouter(stores: IngestStores): Router {
  const router = Router();

  // Bodies are read as JSON whatever their Content-Type; non-JSON fails with 400
  router.use(express.json({ type: () => true, limit: config.jsonBodyLimit }));

  router.post("/:apiKey", async (req: Request<{ apiKey: string }>, res: Response) => {
    const payload: unknown = req.body;

    if (!isJsonObject(payload)) {
      return res.status(400).json({ error: "Payload must be a JSON object" });
    }

    try {
      const response = await ingestPayload(
        stores,
        {
          apiKey: req.params.apiKey,
          payload,
          sourceIp: req.ip ?? null,
        },
        { excludedFields: config.excludedFields }
      );

      return res.status(200).json(response);
    } catch (error) {
      if (error instanceof AccountNotFoundError) {
        return res.status(404).json({ error: error.message });
      }

      const message = error instanceof Error ? error.message : "Unknown error";
      console.error(`[ingest] Error:`, message);
      return res.status(500).json({ error: "Failed to ingest payload" });
    }
  });

  return router;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
