import crypto from "node:crypto";

import { createLogger, describeError, type Logger } from "../telemetry/logger.js";
import { ORDER_TYPES, type OrderType } from "../trading/tradeIntent.js";
import { resolveDataDir } from "./dataPaths.js";
import { appendNdjsonRecord, readNdjsonRecords } from "./ndjsonStore.js";

const TRADE_JOURNAL_FILE = "trade-journal.ndjson";

export type LegStatus = "placed" | "failed";

export interface TradeJournalRecord {
  readonly id: string;
  readonly timestamp: number;
  readonly sessionId: string;
  readonly symbol: string;
  readonly orderType: OrderType;
  readonly volume: number;
  readonly openPrice?: number;
  readonly stopLoss: number;
  readonly takeProfit: number;
  readonly status: LegStatus;
  readonly stringCode?: string;
  readonly message: string;
  readonly orderId?: string;
}

export type TradeJournalInput = Omit<TradeJournalRecord, "id" | "timestamp"> & {
  readonly timestamp?: number;
};

export interface TradeJournalOptions {
  readonly dataDir?: string;
  readonly logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function toJournalRecord(item: unknown): TradeJournalRecord | undefined {
  if (!isRecord(item)) {
    return undefined;
  }
  const { id, timestamp, sessionId, symbol, orderType, volume, stopLoss, takeProfit, status, message } = item;
  if (
    typeof id !== "string" ||
    typeof timestamp !== "number" ||
    typeof sessionId !== "string" ||
    typeof symbol !== "string" ||
    typeof volume !== "number" ||
    typeof stopLoss !== "number" ||
    typeof takeProfit !== "number" ||
    typeof message !== "string"
  ) {
    return undefined;
  }
  const knownOrderType = ORDER_TYPES.find((candidate) => candidate === orderType);
  if (!knownOrderType || (status !== "placed" && status !== "failed")) {
    return undefined;
  }
  return {
    id,
    timestamp,
    sessionId,
    symbol,
    orderType: knownOrderType,
    volume,
    openPrice: optionalNumber(item.openPrice),
    stopLoss,
    takeProfit,
    status,
    stringCode: optionalString(item.stringCode),
    message,
    orderId: optionalString(item.orderId),
  };
}

/** Append-only NDJSON log of every order leg sent to the brokerage. */
export class TradeJournal {
  private readonly directory: string;
  private readonly logger: Logger;

  constructor(options: TradeJournalOptions = {}) {
    this.directory = resolveDataDir(options.dataDir);
    this.logger = options.logger ?? createLogger("journal");
  }

  async append(input: TradeJournalInput): Promise<TradeJournalRecord> {
    const entry: TradeJournalRecord = {
      ...input,
      id: crypto.randomUUID(),
      timestamp: input.timestamp ?? Date.now(),
    };
    await appendNdjsonRecord({ directory: this.directory, fileName: TRADE_JOURNAL_FILE, record: entry });
    return entry;
  }

  async list(limit?: number): Promise<TradeJournalRecord[]> {
    return readNdjsonRecords({
      directory: this.directory,
      fileName: TRADE_JOURNAL_FILE,
      limit,
      mapper: toJournalRecord,
      onInvalidLine: (error) => {
        this.logger.warn("Skipping unreadable journal line", { error: describeError(error) });
      },
    });
  }
}
