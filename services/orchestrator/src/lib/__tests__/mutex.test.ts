import { describe, it, expect } from "vitest";
import { Mutex } from "../mutex";

describe("Mutex", () => {
  it("grants the lock in request order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    const first = await mutex.acquire();
    const second = mutex.acquire().then((release) => {
      order.push(2);
      release();
    });
    const third = mutex.acquire().then((release) => {
      order.push(3);
      release();
    });

    expect(mutex.waiting).toBe(2);
    order.push(1);
    first();
    await Promise.all([second, third]);

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked).toBe(false);
  });

  it("ignores a repeated release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const waiter = mutex.acquire();

    release();
    release();
    const secondRelease = await waiter;

    expect(mutex.isLocked).toBe(true);
    secondRelease();
    expect(mutex.isLocked).toBe(false);
  });

  it("releases after runExclusive throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => 7)).resolves.toBe(7);
  });
});
