import { describe, it, expect } from "vitest";
import { createLimiter } from "../limiter.js";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("createLimiter", () => {
  it("runs at most `concurrency` tasks at once", async () => {
    const limit = createLimiter(2);
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()];
    const started: number[] = [];

    const results = gates.map((gate, i) =>
      limit(() => {
        started.push(i);
        return gate.promise;
      }),
    );

    await flush();
    expect(started).toEqual([0, 1]);

    gates[0].resolve(10);
    await flush();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve(11);
    gates[2].resolve(12);
    expect(await Promise.all(results)).toEqual([10, 11, 12]);
  });

  it("starts queued tasks in submission order", async () => {
    const limit = createLimiter(1);
    const order: string[] = [];
    await Promise.all(
      ["a", "b", "c"].map((name) =>
        limit(async () => {
          order.push(name);
        }),
      ),
    );
    expect(order).toEqual(["a", "b", "c"]);
  });

  it("frees the slot when a task rejects", async () => {
    const limit = createLimiter(1);
    const failed = limit(() => Promise.reject(new Error("EACCES")));
    const next = limit(async () => "ran");

    await expect(failed).rejects.toThrow("EACCES");
    expect(await next).toBe("ran");
  });

  it("turns a synchronous throw into a rejection", async () => {
    const limit = createLimiter(1);
    await expect(
      limit(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });

  it("does not bound anything when concurrency is 0", async () => {
    const limit = createLimiter(0);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    let started = 0;

    const results = gates.map((gate) =>
      limit(() => {
        started++;
        return gate.promise;
      }),
    );

    await flush();
    expect(started).toBe(3);
    gates.forEach((gate) => gate.resolve());
    await Promise.all(results);
  });
});
