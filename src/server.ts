import express, { type Express, type Request, type Response } from "express";

import { parseTelegramUpdate } from "./services/integrations/telegram/index.js";
import type { TradeJournalRecord } from "./storage/tradeJournal.js";
import { createLogger, describeError, type Logger } from "./telemetry/logger.js";
import type { InboundMessage } from "./trading/messageTransport.js";

export interface JournalReader {
  list(limit?: number): Promise<TradeJournalRecord[]>;
}

export interface WebhookServerOptions {
  /** Path segment updates must be posted to; the bot token. */
  readonly webhookToken: string;
  readonly onMessage: (message: InboundMessage) => Promise<void>;
  /** Served newest first under `GET /<token>/journal` when set. */
  readonly journal?: JournalReader;
  readonly logger?: Logger;
}

const DEFAULT_JOURNAL_LIMIT = 50;

function parseLimit(value: unknown): number | undefined {
  if (value === undefined) {
    return DEFAULT_JOURNAL_LIMIT;
  }
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    return undefined;
  }
  const limit = Number.parseInt(value, 10);
  return limit > 0 ? limit : undefined;
}

export function createServer(options: WebhookServerOptions): Express {
  const logger = options.logger ?? createLogger("server");
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  const { journal } = options;
  if (journal) {
    app.get("/:token/journal", async (req: Request, res: Response) => {
      if (req.params.token !== options.webhookToken) {
        res.status(404).json({ error: "Not found" });
        return;
      }
      const limit = parseLimit(req.query.limit);
      if (limit === undefined) {
        res.status(400).json({ error: "limit must be a positive integer" });
        return;
      }
      try {
        res.json({ records: await journal.list(limit) });
      } catch (error) {
        logger.error("Failed to read trade journal", { error: describeError(error) });
        res.status(500).json({ error: "Failed to read trade journal" });
      }
    });
  }

  app.post("/:token", (req: Request, res: Response) => {
    if (req.params.token !== options.webhookToken) {
      res.status(404).json({ error: "Not found" });
      return;
    }

    const message = parseTelegramUpdate(req.body);
    if (message) {
      // acknowledged before handling so the update is not redelivered while the flow runs
      void options.onMessage(message).catch((error) => {
        logger.error("Failed to handle update", { sessionId: message.sessionId, error: describeError(error) });
      });
    } else {
      logger.debug("Ignoring update without text");
    }
    res.json({ ok: true });
  });

  return app;
}
