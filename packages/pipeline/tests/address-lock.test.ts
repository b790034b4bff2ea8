import { describe, it, expect } from "vitest";
import { KeyedMutex, Mutex, addressLockKey } from "../src/address-lock.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe("Mutex", () => {
  it("grants the lock in FIFO order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    const release1 = await mutex.acquire();
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
    release1();
    await Promise.all([second, third]);

    expect(order).toEqual([1, 2, 3]);
    expect(mutex.isLocked()).toBe(false);
  });
});

describe("KeyedMutex", () => {
  it("serializes work under one key", async () => {
    const locks = new KeyedMutex();
    let active = 0;
    let maxActive = 0;

    const work = () =>
      locks.withLock("8453:0xabc", async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await tick();
        active--;
      });

    await Promise.all([work(), work(), work()]);
    expect(maxActive).toBe(1);
  });

  it("runs different keys concurrently", async () => {
    const locks = new KeyedMutex();
    let active = 0;
    let maxActive = 0;

    const work = (key: string) =>
      locks.withLock(key, async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await tick();
        active--;
      });

    await Promise.all([work("a"), work("b")]);
    expect(maxActive).toBe(2);
  });

  it("releases the lock when the work throws", async () => {
    const locks = new KeyedMutex();
    await expect(
      locks.withLock("k", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(locks.isLocked("k")).toBe(false);
    expect(locks.size).toBe(0);
  });

  it("ignores a second release", async () => {
    const locks = new KeyedMutex();
    const release = await locks.acquire("k");
    release();
    release();
    expect(locks.size).toBe(0);
  });
});

describe("addressLockKey", () => {
  it("ignores address case", () => {
    expect(addressLockKey(1, "0xABCDEF0000000000000000000000000000000001")).toBe(
      "1:0xabcdef0000000000000000000000000000000001",
    );
  });
});
