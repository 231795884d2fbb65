import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { TradeJournal } from "../src/storage/tradeJournal.js";
import { GatewayError } from "../src/trading/brokerageGateway.js";
import { TradeExecutor, type TradeFlowEvent } from "../src/trading/tradeExecutor.js";
import type { TradeIntent } from "../src/trading/tradeIntent.js";
import { FakeBrokerage, rejection, silentLogger } from "./support/fakes.js";

const marketBuy: TradeIntent = {
  orderType: "Buy",
  symbol: "GBPUSD",
  entry: { type: "market" },
  stopLoss: 1.14336,
  takeProfits: [1.2893, 1.29845],
  riskFraction: 0.02,
  text: "BUY GBPUSD\nEntry NOW\nSL 1.14336\nTP 1.28930\nTP 1.29845",
};

const buyLimit: TradeIntent = {
  orderType: "Buy Limit",
  symbol: "GBPUSD",
  entry: { type: "price", price: 1.1448 },
  stopLoss: 1.14336,
  takeProfits: [1.2893],
  riskFraction: 0.02,
  text: "BUY LIMIT GBPUSD\nEntry 1.14480\nSL 1.14336\nTP 1.28930",
};

function createExecutor(gateway: FakeBrokerage, journal?: TradeJournal): TradeExecutor {
  return new TradeExecutor({
    gateway,
    accountId: "acc-1",
    allowedAccountLogin: 555_001,
    journal,
    logger: silentLogger,
  });
}

function collect(events: TradeFlowEvent[]) {
  return async (event: TradeFlowEvent) => {
    events.push(event);
  };
}

describe("TradeExecutor", () => {
  it("connects and reports without placing orders", async () => {
    const gateway = new FakeBrokerage();
    const events: TradeFlowEvent[] = [];

    const outcome = await createExecutor(gateway).run(marketBuy, {
      sessionId: "chat-1",
      placeOrders: false,
      onEvent: collect(events),
    });

    expect(outcome.status).toBe("reported");
    expect(events.map((event) => event.type)).toEqual(["connected", "report"]);
    expect(gateway.calls).toEqual([
      "getAccount:acc-1",
      "waitConnected",
      "openConnection:acc-1",
      "connect",
      "waitSynchronized",
      "getAccountInformation",
      "getSymbolPrice:GBPUSD",
    ]);
    expect(gateway.orders).toEqual([]);
  });

  it("deploys an undeployed account first", async () => {
    const gateway = new FakeBrokerage({ state: "UNDEPLOYED" });

    await createExecutor(gateway).run(buyLimit, { sessionId: "chat-1", placeOrders: false });

    expect(gateway.calls.slice(0, 3)).toEqual(["getAccount:acc-1", "deploy", "waitConnected"]);
  });

  it("prices a market buy at the ask and a market sell at the bid", async () => {
    const price = { symbol: "GBPUSD", bid: 1.2, ask: 1.21003 };
    const buy = await createExecutor(new FakeBrokerage({ price })).run(marketBuy, {
      sessionId: "chat-1",
      placeOrders: false,
    });
    const sell = await createExecutor(new FakeBrokerage({ price })).run(
      { ...marketBuy, orderType: "Sell", stopLoss: 1.25, takeProfits: [1.15] },
      { sessionId: "chat-1", placeOrders: false },
    );

    expect(buy.status === "reported" && buy.report.entryPrice).toBe(1.21003);
    expect(sell.status === "reported" && sell.report.entryPrice).toBe(1.2);
  });

  it("splits the position across both take profit legs", async () => {
    const gateway = new FakeBrokerage();
    const events: TradeFlowEvent[] = [];

    const outcome = await createExecutor(gateway).run(marketBuy, {
      sessionId: "chat-1",
      placeOrders: true,
      onEvent: collect(events),
    });

    expect(outcome.status).toBe("executed");
    expect(events.map((event) => event.type)).toEqual(["connected", "report", "placing", "leg_placed", "leg_placed"]);
    expect(gateway.orders).toEqual([
      { orderType: "Buy", symbol: "GBPUSD", volume: 0.01, stopLoss: 1.14336, takeProfit: 1.2893 },
      { orderType: "Buy", symbol: "GBPUSD", volume: 0.01, stopLoss: 1.14336, takeProfit: 1.29845 },
    ]);
  });

  it("sends the parsed entry as open price for pending orders", async () => {
    const gateway = new FakeBrokerage();

    await createExecutor(gateway).run(buyLimit, { sessionId: "chat-1", placeOrders: true });

    expect(gateway.orders).toEqual([
      {
        orderType: "Buy Limit",
        symbol: "GBPUSD",
        volume: 1.42,
        openPrice: 1.1448,
        stopLoss: 1.14336,
        takeProfit: 1.2893,
      },
    ]);
  });

  it("keeps the first leg when the second is rejected", async () => {
    const gateway = new FakeBrokerage({
      orderResults: [
        { numericCode: 10009, stringCode: "TRADE_RETCODE_DONE", message: "Request completed", orderId: "71" },
        rejection("No money"),
      ],
    });
    const events: TradeFlowEvent[] = [];

    const outcome = await createExecutor(gateway).run(marketBuy, {
      sessionId: "chat-1",
      placeOrders: true,
      onEvent: collect(events),
    });

    expect(outcome.status === "executed" && outcome.legs.map((leg) => leg.status)).toEqual(["placed", "failed"]);
    const failed = events.find((event) => event.type === "leg_failed");
    expect(failed?.type === "leg_failed" && failed.leg.message).toBe("No money");
    expect(failed?.type === "leg_failed" && failed.leg.stringCode).toBe("TRADE_RETCODE_NO_MONEY");
  });

  it("stops when connected to another login", async () => {
    const gateway = new FakeBrokerage({ account: { login: 999, balance: 10_000 } });
    const events: TradeFlowEvent[] = [];

    const outcome = await createExecutor(gateway).run(marketBuy, {
      sessionId: "chat-1",
      placeOrders: true,
      onEvent: collect(events),
    });

    expect(outcome).toEqual({ status: "account_mismatch", login: 999 });
    expect(events).toEqual([]);
    expect(gateway.orders).toEqual([]);
  });

  it("surfaces connection errors", async () => {
    const gateway = new FakeBrokerage({ connectError: new GatewayError("broker offline") });

    const outcome = await createExecutor(gateway).run(marketBuy, { sessionId: "chat-1", placeOrders: true });

    expect(outcome).toEqual({ status: "connection_failed", message: "broker offline" });
  });

  it("rejects placement when the position rounds down to zero", async () => {
    const gateway = new FakeBrokerage({ account: { login: 555_001, balance: 50 } });

    const outcome = await createExecutor(gateway).run(marketBuy, { sessionId: "chat-1", placeOrders: true });

    expect(outcome).toEqual({
      status: "rejected",
      reason: "Position size rounds down to 0.00 lots for this balance and stop loss",
    });
    expect(gateway.orders).toEqual([]);
  });

  it("rejects a market entry within one pip of the stop", async () => {
    const gateway = new FakeBrokerage({ price: { symbol: "GBPUSD", bid: 1.14330, ask: 1.14338 } });

    const outcome = await createExecutor(gateway).run(marketBuy, { sessionId: "chat-1", placeOrders: false });

    expect(outcome).toEqual({ status: "rejected", reason: "Stop loss must be at least one pip away from the entry" });
  });

  it("keeps going when a progress update cannot be delivered", async () => {
    const gateway = new FakeBrokerage();

    const outcome = await createExecutor(gateway).run(marketBuy, {
      sessionId: "chat-1",
      placeOrders: true,
      onEvent: async () => {
        throw new Error("chat unreachable");
      },
    });

    expect(outcome.status).toBe("executed");
    expect(gateway.orders).toHaveLength(2);
  });

  describe("journal", () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), "executor-journal-"));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it("records every leg outcome", async () => {
      const journal = new TradeJournal({ dataDir: directory, logger: silentLogger });
      const gateway = new FakeBrokerage({
        orderResults: [
          { numericCode: 10009, stringCode: "TRADE_RETCODE_DONE", message: "Request completed", orderId: "71" },
          rejection("No money"),
        ],
      });

      await createExecutor(gateway, journal).run(marketBuy, { sessionId: "chat-7", placeOrders: true });

      const records = await journal.list();
      expect(records.map((record) => [record.status, record.takeProfit, record.sessionId])).toEqual([
        ["failed", 1.29845, "chat-7"],
        ["placed", 1.2893, "chat-7"],
      ]);
      expect(records[1]?.orderId).toBe("71");
    });
  });
});
