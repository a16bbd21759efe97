import { describe, it, expect } from "vitest";
import { TurnQueue } from "../../src/core/turn-queue.js";
import { Semaphore } from "../../src/core/semaphore.js";
import { delay } from "../helpers/fixtures.js";

describe("TurnQueue", () => {
  it("runs one user's turns in arrival order", async () => {
    const queue = new TurnQueue(5);
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      queue.enqueue("u1", task("a", 20)),
      queue.enqueue("u1", task("b", 0)),
    ]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("runs different users concurrently, up to the limit", async () => {
    const track = async (queue: TurnQueue): Promise<number> => {
      let running = 0;
      let peak = 0;
      const task = async () => {
        running++;
        peak = Math.max(peak, running);
        await delay(10);
        running--;
      };
      await Promise.all(["u1", "u2", "u3"].map((user) => queue.enqueue(user, task)));
      return peak;
    };

    expect(await track(new TurnQueue(5))).toBe(3);
    expect(await track(new TurnQueue(1))).toBe(1);
  });

  it("keeps going after a failed turn", async () => {
    const queue = new TurnQueue(2);
    const failed = queue.enqueue("u1", async () => {
      throw new Error("boom");
    });
    const next = queue.enqueue("u1", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("forgets users once their turns settle", async () => {
    const queue = new TurnQueue(2);
    void queue.enqueue("u1", () => delay(5));
    void queue.enqueue("u2", () => delay(5));
    expect(queue.activeUsers).toBe(2);

    await queue.drain();
    expect(queue.activeUsers).toBe(0);
  });
});

describe("Semaphore", () => {
  it("rejects a non-positive size", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore maxPermits must be >= 1, got 0");
  });

  it("releases the permit when the task throws", async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(semaphore.available).toBe(1);
  });
});
