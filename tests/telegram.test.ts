import { afterEach, describe, expect, it, vi } from "vitest";

import { HttpRequestError } from "../src/services/integrations/http/retryingHttpClient.js";
import {
  botApiBaseUrl,
  parseTelegramUpdate,
  TelegramBotClient,
} from "../src/services/integrations/telegram/index.js";
import { silentLogger } from "./support/fakes.js";

const TOKEN = "123456:test-secret";

function createClient(): TelegramBotClient {
  return new TelegramBotClient({
    token: TOKEN,
    http: {
      baseUrl: "https://telegram.test/",
      timeoutMs: 1_000,
      rateLimitPerSecond: 0,
      retry: { maxAttempts: 1, initialDelayMs: 1, backoffMultiplier: 1, maxDelayMs: 1 },
    },
    logger: silentLogger,
  });
}

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { "Content-Type": "application/json" } });
}

function stubTelegram(response: () => Response) {
  const calls: { url: string; payload: unknown }[] = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      calls.push({ url: String(input), payload: typeof init?.body === "string" ? JSON.parse(init.body) : undefined });
      return response();
    }),
  );
  return calls;
}

describe("botApiBaseUrl", () => {
  it("appends the bot token path", () => {
    expect(botApiBaseUrl("https://api.telegram.org/", TOKEN)).toBe("https://api.telegram.org/bot123456:test-secret/");
    expect(botApiBaseUrl("https://api.telegram.org", TOKEN)).toBe("https://api.telegram.org/bot123456:test-secret/");
  });
});

describe("TelegramBotClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends HTML replies to the chat", async () => {
    const calls = stubTelegram(() => json({ ok: true, result: {} }));

    await createClient().reply("42", "<pre>table</pre>", { format: "html" });

    expect(calls).toEqual([
      {
        url: "https://telegram.test/bot123456:test-secret/sendMessage",
        payload: { chat_id: "42", text: "<pre>table</pre>", parse_mode: "HTML", disable_web_page_preview: true },
      },
    ]);
  });

  it("sends plain replies without a parse mode", async () => {
    const calls = stubTelegram(() => json({ ok: true, result: {} }));

    await createClient().reply("42", "hello");

    expect(calls[0]?.payload).toEqual({ chat_id: "42", text: "hello", disable_web_page_preview: true });
  });

  it("registers the webhook", async () => {
    const calls = stubTelegram(() => json({ ok: true, result: true }));

    await createClient().setWebhook(`https://bot.example.test/${TOKEN}`);

    expect(calls[0]).toEqual({
      url: "https://telegram.test/bot123456:test-secret/setWebhook",
      payload: { url: `https://bot.example.test/${TOKEN}`, allowed_updates: ["message", "edited_message"] },
    });
  });

  it("reports API failures with the Telegram description", async () => {
    stubTelegram(() => json({ ok: false, description: "Bad Request: chat not found" }, 400));

    const sending = createClient().reply("42", "hello");

    await expect(sending).rejects.toBeInstanceOf(HttpRequestError);
    await expect(sending).rejects.toThrow("Unexpected status 400: Bad Request: chat not found");
  });

  it("treats ok: false as a failure", async () => {
    stubTelegram(() => json({ ok: false, description: "Forbidden" }));

    await expect(createClient().reply("42", "hello")).rejects.toThrow("Telegram sendMessage failed: Forbidden");
  });
});

describe("parseTelegramUpdate", () => {
  it("reads chat id, username and text", () => {
    expect(
      parseTelegramUpdate({
        update_id: 1,
        message: { message_id: 5, chat: { id: 42, type: "private", username: "trader" }, text: "/trade" },
      }),
    ).toEqual({ sessionId: "42", username: "trader", text: "/trade" });
  });

  it("falls back to the sender username", () => {
    expect(
      parseTelegramUpdate({
        edited_message: { chat: { id: -100, type: "group" }, from: { id: 7, username: "trader" }, text: "/help" },
      }),
    ).toEqual({ sessionId: "-100", username: "trader", text: "/help" });
  });

  it("ignores updates without text", () => {
    expect(parseTelegramUpdate({ message: { chat: { id: 42 }, sticker: {} } })).toBeUndefined();
    expect(parseTelegramUpdate({ callback_query: { id: "1" } })).toBeUndefined();
    expect(parseTelegramUpdate("nope")).toBeUndefined();
  });
});
