/**
 * Throttle: bounded-concurrency gate plus a periodic drain barrier.
 *
 * At most `maxParallel` permits are outstanding at once. Separately, every
 * completed call is counted in a shared {@link CallLedger}; once
 * `callsSinceBarrier` reaches `barrierThreshold`, new dispatch stops until
 * every in-flight permit has been released, then the counter resets. It is not
 * a rate limiter.
 *
 * The owner must also call {@link Throttle.drain} at the end of every sweep
 * so nothing is still writing when consolidation starts.
 */

import type { Logger } from "pino";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_PARALLEL = 8;
export const DEFAULT_BARRIER_THRESHOLD = 1000;

// ---------------------------------------------------------------------------
// CallLedger
// ---------------------------------------------------------------------------

export type BarrierReason = "threshold" | "sweep";

/**
 * Process-wide call counters. One instance is shared by every executor in a
 * run; pass it explicitly rather than reading globals.
 */
export class CallLedger {
  private _totalCalls = 0;
  private _callsSinceBarrier = 0;
  private _barriers: Record<BarrierReason, number> = { threshold: 0, sweep: 0 };

  get totalCalls(): number {
    return this._totalCalls;
  }

  get callsSinceBarrier(): number {
    return this._callsSinceBarrier;
  }

  /** Barriers fired so far, by reason */
  get barriers(): Readonly<Record<BarrierReason, number>> {
    return this._barriers;
  }

  /** Count one completed call */
  record(): void {
    this._totalCalls++;
    this._callsSinceBarrier++;
  }

  /** Mark a barrier as fired; returns the count it cleared */
  resetBarrier(reason: BarrierReason): number {
    const cleared = this._callsSinceBarrier;
    this._callsSinceBarrier = 0;
    this._barriers[reason]++;
    return cleared;
  }
}

// ---------------------------------------------------------------------------
// Throttle
// ---------------------------------------------------------------------------

/** Proof of an acquired slot; release exactly once */
export interface Permit {
  readonly id: number;
}

export interface ThrottleOptions {
  /** Maximum in-flight calls (default: 8) */
  maxParallel?: number;
  /** Completed calls between drain barriers (default: 1000) */
  barrierThreshold?: number;
  logger?: Logger;
}

export class Throttle {
  readonly maxParallel: number;
  readonly barrierThreshold: number;
  private ledger: CallLedger;
  private logger: Logger | null;

  private inFlight = new Set<number>();
  private nextPermitId = 1;

  /** Acquirers waiting for a free slot */
  private slotWaiters: (() => void)[] = [];

  /** Resolved whenever in-flight drops to zero */
  private idleWaiters: (() => void)[] = [];

  /** The barrier currently draining, if any */
  private barrier: Promise<void> | null = null;

  constructor(ledger: CallLedger, options?: ThrottleOptions) {
    this.ledger = ledger;
    this.maxParallel = options?.maxParallel ?? DEFAULT_MAX_PARALLEL;
    this.barrierThreshold = options?.barrierThreshold ?? DEFAULT_BARRIER_THRESHOLD;
    this.logger = options?.logger ?? null;

    if (!Number.isInteger(this.maxParallel) || this.maxParallel < 1) {
      throw new RangeError(`maxParallel must be a positive integer, got ${this.maxParallel}`);
    }
    if (!Number.isInteger(this.barrierThreshold) || this.barrierThreshold < 1) {
      throw new RangeError(
        `barrierThreshold must be a positive integer, got ${this.barrierThreshold}`,
      );
    }
  }

  /** Number of permits currently held */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Whether a barrier is currently holding back dispatch */
  get isDraining(): boolean {
    return this.barrier !== null;
  }

  /**
   * Wait for a free slot. Blocks while a barrier is draining, and starts one
   * when the ledger has reached the threshold.
   */
  async acquire(): Promise<Permit> {
    for (;;) {
      if (this.barrier) {
        await this.barrier;
        continue;
      }
      if (this.ledger.callsSinceBarrier >= this.barrierThreshold) {
        this.barrier = this.runBarrier("threshold");
        continue;
      }
      if (this.inFlight.size < this.maxParallel) {
        const permit: Permit = { id: this.nextPermitId++ };
        this.inFlight.add(permit.id);
        return permit;
      }
      await new Promise<void>((resolve) => this.slotWaiters.push(resolve));
    }
  }

  release(permit: Permit): void {
    if (!this.inFlight.delete(permit.id)) {
      throw new Error(`Permit ${permit.id} is not held`);
    }
    this.slotWaiters.shift()?.();
    if (this.inFlight.size === 0) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }

  /** Count one completed call (success or failure) */
  recordCall(): void {
    this.ledger.record();
    this.logger?.debug(
      {
        totalCalls: this.ledger.totalCalls,
        callsSinceBarrier: this.ledger.callsSinceBarrier,
      },
      "API call counted",
    );
  }

  /**
   * End-of-sweep barrier: wait for every in-flight permit, then fire the
   * barrier regardless of the threshold.
   */
  async drain(): Promise<void> {
    while (this.barrier) await this.barrier;
    this.barrier = this.runBarrier("sweep");
    await this.barrier;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async runBarrier(reason: BarrierReason): Promise<void> {
    this.logger?.info(
      { reason, callsSinceBarrier: this.ledger.callsSinceBarrier, inFlight: this.inFlight.size },
      "Barrier reached, waiting for in-flight calls",
    );
    await this.waitForIdle();

    const cleared = this.ledger.resetBarrier(reason);
    this.barrier = null;
    this.logger?.info(
      { reason, callsSinceBarrier: cleared, totalCalls: this.ledger.totalCalls },
      "Barrier released, counter reset",
    );

    // Let everyone queued behind the barrier compete for slots again
    for (const resolve of this.slotWaiters.splice(0)) resolve();
  }

  private waitForIdle(): Promise<void> {
    if (this.inFlight.size === 0) return Promise.resolve();
    return new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }
}
