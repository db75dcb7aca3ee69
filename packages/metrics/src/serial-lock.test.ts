import { describe, it, expect } from "vitest";
import { SerialLock } from "./serial-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe("SerialLock", () => {
  it("runs sections one at a time in call order", async () => {
    const lock = new SerialLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run(() => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("returns the section's value", async () => {
    const lock = new SerialLock();
    await expect(lock.run(async () => 42)).resolves.toBe(42);
  });

  it("keeps working after a section throws", async () => {
    const lock = new SerialLock();
    await expect(
      lock.run(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.run(() => "after")).resolves.toBe("after");
  });
});
