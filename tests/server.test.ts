import request from "supertest";
import { describe, expect, it, vi } from "vitest";

import { createServer, type JournalReader } from "../src/server.js";
import type { TradeJournalRecord } from "../src/storage/tradeJournal.js";
import type { InboundMessage } from "../src/trading/messageTransport.js";
import { silentLogger } from "./support/fakes.js";

const TOKEN = "123456:test-secret";

function setup(onMessage: (message: InboundMessage) => Promise<void> = async () => undefined) {
  const handler = vi.fn(onMessage);
  const app = createServer({ webhookToken: TOKEN, onMessage: handler, logger: silentLogger });
  return { app, handler };
}

describe("webhook server", () => {
  it("answers health checks", async () => {
    const { app } = setup();

    const response = await request(app).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok" });
  });

  it("rejects updates posted to another path", async () => {
    const { app, handler } = setup();

    const response = await request(app)
      .post("/not-the-token")
      .send({ message: { chat: { id: 42, username: "trader" }, text: "/start" } });

    expect(response.status).toBe(404);
    expect(handler).not.toHaveBeenCalled();
  });

  it("hands text updates to the controller", async () => {
    const { app, handler } = setup();

    const response = await request(app)
      .post(`/${TOKEN}`)
      .send({ update_id: 9, message: { chat: { id: 42, username: "trader" }, text: "/start" } });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
    expect(handler).toHaveBeenCalledWith({ sessionId: "42", username: "trader", text: "/start" });
  });

  it("acknowledges updates without text", async () => {
    const { app, handler } = setup();

    const response = await request(app)
      .post(`/${TOKEN}`)
      .send({ update_id: 10, my_chat_member: { chat: { id: 42 } } });

    expect(response.status).toBe(200);
    expect(handler).not.toHaveBeenCalled();
  });

  it("acknowledges even when handling fails", async () => {
    const { app } = setup(async () => {
      throw new Error("transport down");
    });

    const response = await request(app)
      .post(`/${TOKEN}`)
      .send({ message: { chat: { id: 42, username: "trader" }, text: "/help" } });

    expect(response.status).toBe(200);
  });
});

const RECORD: TradeJournalRecord = {
  id: "rec-1",
  timestamp: 2_000,
  sessionId: "42",
  symbol: "GBPUSD",
  orderType: "Buy",
  volume: 0.01,
  stopLoss: 1.14336,
  takeProfit: 1.2893,
  status: "placed",
  stringCode: "TRADE_RETCODE_DONE",
  message: "Request completed",
  orderId: "71",
};

describe("journal endpoint", () => {
  function setupJournal(list: JournalReader["list"]) {
    const reader = { list: vi.fn(list) };
    const app = createServer({
      webhookToken: TOKEN,
      onMessage: async () => undefined,
      journal: reader,
      logger: silentLogger,
    });
    return { app, reader };
  }

  it("lists journal records behind the token path", async () => {
    const { app, reader } = setupJournal(async () => [RECORD]);

    const response = await request(app).get(`/${TOKEN}/journal`).query({ limit: "5" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ records: [RECORD] });
    expect(reader.list).toHaveBeenCalledWith(5);
  });

  it("defaults to the 50 newest records", async () => {
    const { app, reader } = setupJournal(async () => []);

    await request(app).get(`/${TOKEN}/journal`);

    expect(reader.list).toHaveBeenCalledWith(50);
  });

  it("hides the journal from other paths", async () => {
    const { app, reader } = setupJournal(async () => [RECORD]);

    const response = await request(app).get("/not-the-token/journal");

    expect(response.status).toBe(404);
    expect(reader.list).not.toHaveBeenCalled();
  });

  it("rejects a malformed limit", async () => {
    const { app } = setupJournal(async () => []);

    const response = await request(app).get(`/${TOKEN}/journal`).query({ limit: "0" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "limit must be a positive integer" });
  });

  it("answers 500 when the journal cannot be read", async () => {
    const { app } = setupJournal(async () => {
      throw new Error("disk gone");
    });

    const response = await request(app).get(`/${TOKEN}/journal`);

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: "Failed to read trade journal" });
  });
});
