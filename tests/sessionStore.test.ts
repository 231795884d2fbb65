import { describe, expect, it } from "vitest";

import { SessionStore } from "../src/storage/sessionStore.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("SessionStore", () => {
  it("stores and clears state per session", () => {
    const store = new SessionStore<string>();

    store.set("a", "awaiting");
    store.set("b", "other");
    store.clear("a");

    expect(store.get("a")).toBeUndefined();
    expect(store.get("b")).toBe("other");
    expect(store.size).toBe(1);
  });

  it("runs tasks of one session one at a time", async () => {
    const store = new SessionStore<string>();
    const log: string[] = [];

    const first = store.runExclusive("a", async () => {
      log.push("first:start");
      await tick();
      log.push("first:end");
    });
    const second = store.runExclusive("a", async () => {
      log.push("second");
    });
    await Promise.all([first, second]);

    expect(log).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other sessions", async () => {
    const store = new SessionStore<string>();
    const log: string[] = [];

    const slow = store.runExclusive("a", async () => {
      await tick();
      log.push("a");
    });
    const fast = store.runExclusive("b", async () => {
      log.push("b");
    });
    await Promise.all([slow, fast]);

    expect(log).toEqual(["b", "a"]);
  });

  it("keeps the queue alive after a failing task", async () => {
    const store = new SessionStore<string>();

    const failing = store.runExclusive("a", async () => {
      throw new Error("boom");
    });
    const next = store.runExclusive("a", async () => "done");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("done");
  });
});
