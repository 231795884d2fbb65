import { afterEach, describe, expect, it, vi } from "vitest";

import {
  extractErrorDetail,
  HttpRequestError,
  RetryingHttpClient,
} from "../src/services/integrations/http/retryingHttpClient.js";
import { silentLogger } from "./support/fakes.js";

function createClient(maxAttempts = 3): RetryingHttpClient {
  return new RetryingHttpClient({
    http: {
      baseUrl: "https://api.test/v1",
      timeoutMs: 1_000,
      rateLimitPerSecond: 0,
      retry: { maxAttempts, initialDelayMs: 1, backoffMultiplier: 1, maxDelayMs: 1 },
    },
    service: "test",
    logger: silentLogger,
  });
}

function stubResponses(...responses: Response[]) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) {
      throw new Error("no more responses");
    }
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("RetryingHttpClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("resolves paths against the base URL with search params", async () => {
    const fetchMock = stubResponses(new Response(JSON.stringify({ value: 1 }), { status: 200 }));

    const payload = await createClient().get<{ value: number }>("items", { searchParams: { limit: 5, skip: undefined } });

    expect(payload).toEqual({ value: 1 });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.test/v1/items?limit=5");
  });

  it("retries server errors", async () => {
    const fetchMock = stubResponses(
      new Response("busy", { status: 503 }),
      new Response(JSON.stringify({ ok: true }), { status: 200 }),
    );

    await expect(createClient().post("items")).resolves.toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("stops after the configured attempts", async () => {
    stubResponses(new Response("busy", { status: 503 }), new Response("still busy", { status: 503 }));

    await expect(createClient(2).get("items")).rejects.toThrow("Failed after 2 attempts with status 503: still busy");
  });

  it("sends once when retries are turned off", async () => {
    const fetchMock = stubResponses(
      new Response("gateway timeout", { status: 504 }),
      new Response(JSON.stringify({ ok: true }), { status: 200 }),
    );

    await expect(createClient().post("orders", { retry: false })).rejects.toThrow(
      "Failed after 1 attempts with status 504: gateway timeout",
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("does not retry client errors", async () => {
    const fetchMock = stubResponses(
      new Response(JSON.stringify({ error: "ValidationError", message: "volume is invalid" }), { status: 400 }),
    );

    const call = createClient().post("items");

    await expect(call).rejects.toBeInstanceOf(HttpRequestError);
    await expect(call).rejects.toThrow("Unexpected status 400: volume is invalid");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("accepts bodyless statuses through send", async () => {
    stubResponses(new Response(null, { status: 204 }));

    await expect(createClient().send("items/1/deploy", { method: "POST", expectedStatuses: [204] })).resolves.toBeUndefined();
  });
});

describe("extractErrorDetail", () => {
  it("prefers structured messages", () => {
    expect(extractErrorDetail('{"ok":false,"description":"Forbidden"}')).toBe("Forbidden");
    expect(extractErrorDetail("  plain text  ")).toBe("plain text");
    expect(extractErrorDetail("")).toBeUndefined();
  });
});
