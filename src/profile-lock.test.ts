import { describe, it, expect, vi } from "vitest";
import { KeyedLock } from "./profile-lock.js";

function deferred(): { promise: Promise<void>; release: () => void } {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => { release = resolve; });
  return { promise, release };
}

describe("KeyedLock", () => {
  it("runs sections for one key in order, one at a time", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run("profile:a", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = lock.run("profile:a", async () => {
      events.push("second");
      return 2;
    });

    await vi.waitUntil(() => events.length === 1);
    expect(lock.isLocked("profile:a")).toBe(true);
    expect(lock.queueDepth("profile:a")).toBe(1);

    gate.release();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not make different keys wait on each other", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const done: string[] = [];

    const blocked = lock.run("profile:a", async () => {
      await gate.promise;
      done.push("a");
    });
    await lock.run("profile:b", async () => {
      done.push("b");
    });

    expect(done).toEqual(["b"]);
    gate.release();
    await blocked;
    expect(done).toEqual(["b", "a"]);
  });

  it("keeps going after a section fails", async () => {
    const lock = new KeyedLock();
    const failing = lock.run("global", async () => {
      throw new Error("disk full");
    });
    const next = lock.run("global", async () => "ok");

    await expect(failing).rejects.toThrow("disk full");
    await expect(next).resolves.toBe("ok");
  });

  it("turns a synchronous throw into a rejection", async () => {
    const lock = new KeyedLock();
    const fn = (): Promise<string> => {
      throw new Error("sync");
    };
    await expect(lock.run("global", fn)).rejects.toThrow("sync");
    await expect(lock.run("global", async () => "after")).resolves.toBe("after");
  });

  it("forgets idle keys", async () => {
    const lock = new KeyedLock();
    await lock.run("profile:a", async () => undefined);
    await vi.waitUntil(() => !lock.isLocked("profile:a"));
    expect(lock.queueDepth("profile:a")).toBe(0);
  });
});
