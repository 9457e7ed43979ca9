import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../src/infra/keyed-mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work on the same key one at a time", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("txn-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("txn-1", async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.activeKeys).toBe(0);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const blocked = mutex.runExclusive("txn-1", async () => gate.promise);
    const other = await mutex.runExclusive("txn-2", async () => "done");

    expect(other).toBe("done");
    expect(mutex.activeKeys).toBe(1);
    gate.resolve();
    await blocked;
  });

  it("releases the key when the work fails", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("txn-1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrowError("boom");

    expect(await mutex.runExclusive("txn-1", async () => 42)).toBe(42);
    expect(mutex.activeKeys).toBe(0);
  });
});
