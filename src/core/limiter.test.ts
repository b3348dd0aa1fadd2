import { describe, expect, it } from "vitest";
import { ConcurrencyLimiter } from "./limiter.js";
import { PipelineError } from "./errors.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe("ConcurrencyLimiter", () => {
  it("rejects a non-positive limit", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });

  it("runs at most `limit` tasks at once", async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, i) =>
      limiter.run(async () => {
        started.push(i);
        await gate.promise;
        return i;
      })
    );
    await tick();

    expect(started).toEqual([0, 1]);
    expect(limiter.running).toBe(2);
    expect(limiter.pending).toBe(1);

    gates[0].resolve();
    await tick();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
    expect(limiter.running).toBe(0);
  });

  it("frees the slot when a task fails", async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(limiter.run(async () => "next")).resolves.toBe("next");
  });

  it("stops waiting when the signal aborts", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const gate = deferred();
    const holder = limiter.run(() => gate.promise);

    const controller = new AbortController();
    const waiting = limiter.run(async () => "never", controller.signal);
    await tick();
    expect(limiter.pending).toBe(1);

    controller.abort(new Error("stop"));
    await expect(waiting).rejects.toThrowError(
      new PipelineError("timeout", "Aborted while waiting for a fetch slot: stop")
    );
    expect(limiter.pending).toBe(0);

    gate.resolve();
    await holder;
    expect(limiter.running).toBe(0);
  });

  it("rejects immediately when already aborted", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const controller = new AbortController();
    controller.abort("gone");

    await expect(limiter.run(async () => 1, controller.signal)).rejects.toMatchObject({
      kind: "timeout",
      message: "Aborted while waiting for a fetch slot: gone",
    });
  });
});
