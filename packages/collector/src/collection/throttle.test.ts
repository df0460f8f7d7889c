import { describe, it, expect } from "vitest";
import { CallLedger, Throttle } from "./throttle.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Let pending promise callbacks and timers run */
function flush(): Promise<void> {
  return new Promise((r) => setTimeout(r, 0));
}

/** Dispatch `count` tasks through the throttle the way the executor does */
async function runTasks(throttle: Throttle, count: number, workers: number): Promise<void> {
  let next = 0;
  const worker = async () => {
    while (next < count) {
      next++;
      const permit = await throttle.acquire();
      await flush();
      throttle.release(permit);
      throttle.recordCall();
    }
  };
  await Promise.all(Array.from({ length: workers }, worker));
}

// ---------------------------------------------------------------------------
// CallLedger
// ---------------------------------------------------------------------------

describe("CallLedger", () => {
  it("counts calls and resets only the barrier counter", () => {
    const ledger = new CallLedger();
    ledger.record();
    ledger.record();
    ledger.record();

    expect(ledger.resetBarrier("threshold")).toBe(3);
    expect(ledger.totalCalls).toBe(3);
    expect(ledger.callsSinceBarrier).toBe(0);
    expect(ledger.barriers).toEqual({ threshold: 1, sweep: 0 });
  });
});

// ---------------------------------------------------------------------------
// Throttle
// ---------------------------------------------------------------------------

describe("Throttle", () => {
  it("rejects invalid limits", () => {
    expect(() => new Throttle(new CallLedger(), { maxParallel: 0 })).toThrow(RangeError);
    expect(() => new Throttle(new CallLedger(), { barrierThreshold: 0 })).toThrow(RangeError);
  });

  it("never hands out more than maxParallel permits", async () => {
    const throttle = new Throttle(new CallLedger(), { maxParallel: 2 });
    const p1 = await throttle.acquire();
    await throttle.acquire();

    let third = false;
    const pending = throttle.acquire().then((p) => {
      third = true;
      return p;
    });
    await flush();
    expect(third).toBe(false);
    expect(throttle.inFlightCount).toBe(2);

    throttle.release(p1);
    await pending;
    expect(third).toBe(true);
    expect(throttle.inFlightCount).toBe(2);
  });

  it("refuses to release a permit twice", async () => {
    const throttle = new Throttle(new CallLedger());
    const permit = await throttle.acquire();
    throttle.release(permit);
    expect(() => throttle.release(permit)).toThrow("not held");
  });

  it("blocks acquire after the threshold until every in-flight permit is released", async () => {
    const ledger = new CallLedger();
    const throttle = new Throttle(ledger, { maxParallel: 5, barrierThreshold: 3 });

    const p1 = await throttle.acquire();
    const p2 = await throttle.acquire();
    throttle.recordCall();
    throttle.recordCall();
    throttle.recordCall();

    let acquired = false;
    const pending = throttle.acquire().then((p) => {
      acquired = true;
      return p;
    });
    await flush();
    expect(acquired).toBe(false);
    expect(throttle.isDraining).toBe(true);

    throttle.release(p1);
    await flush();
    expect(acquired).toBe(false);

    throttle.release(p2);
    await pending;
    expect(acquired).toBe(true);
    expect(ledger.callsSinceBarrier).toBe(0);
    expect(ledger.totalCalls).toBe(3);
    expect(ledger.barriers.threshold).toBe(1);
    expect(throttle.isDraining).toBe(false);
  });

  it("drain fires a barrier even below the threshold", async () => {
    const ledger = new CallLedger();
    const throttle = new Throttle(ledger, { barrierThreshold: 1000 });

    const permit = await throttle.acquire();
    throttle.recordCall();

    let drained = false;
    const draining = throttle.drain().then(() => {
      drained = true;
    });
    await flush();
    expect(drained).toBe(false);

    throttle.release(permit);
    await draining;
    expect(ledger.callsSinceBarrier).toBe(0);
    expect(ledger.barriers).toEqual({ threshold: 0, sweep: 1 });
  });

  it("drains twice for 250 calls at threshold 100, plus the end-of-sweep drain", async () => {
    const ledger = new CallLedger();
    const throttle = new Throttle(ledger, { maxParallel: 4, barrierThreshold: 100 });

    await runTasks(throttle, 250, 4);
    await throttle.drain();

    expect(ledger.totalCalls).toBe(250);
    expect(ledger.barriers).toEqual({ threshold: 2, sweep: 1 });
    expect(ledger.callsSinceBarrier).toBe(0);
    expect(throttle.inFlightCount).toBe(0);
  });
});
