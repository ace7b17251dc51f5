import { describe, it, expect } from "vitest";
import { KeyedLock } from "../lib/history/keyed-lock";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("KeyedLock", () => {
  it("runs tasks on one key in call order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        order.push("start1");
        await sleep(10);
        order.push("end1");
      }),
      lock.run("a", async () => {
        order.push("start2");
      }),
    ]);

    expect(order).toEqual(["start1", "end1", "start2"]);
  });

  it("lets different keys run side by side", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    const a = lock.run("a", async () => {
      order.push("a-start");
      await sleep(20);
      order.push("a-end");
    });
    const b = lock.run("b", async () => {
      order.push("b");
    });
    expect(lock.activeKeys).toBe(2);

    await Promise.all([a, b]);
    expect(order).toEqual(["a-start", "b", "a-end"]);
    expect(lock.activeKeys).toBe(0);
  });

  it("keeps going after a failed task", async () => {
    const lock = new KeyedLock();

    const failing = lock.run("a", async () => {
      throw new Error("boom");
    });
    const next = lock.run("a", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("ok");
  });
});
