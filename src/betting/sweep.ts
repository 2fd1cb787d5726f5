/**
 * DICEPOOL - Expiry Sweep
 *
 * Reclaims bets nobody claimed before their randomness expired. Pending bets
 * are walked oldest-first from the ledger's pending index; settled bets have
 * already left that index, so every call picks up exactly where the last
 * one stopped and no bet is visited twice.
 *
 * The expiry horizon must be longer than the randomness window: a bet is
 * only swept once it can no longer be claimed.
 */

import { EngineError } from './errors';
import type { BetLedger } from './ledger';
import type { EngineLock } from '../engine/lock';
import type { RandomnessSource } from '../chain/randomness';

/** Blocks after origin before an unclaimed bet is forfeited. */
export const DEFAULT_EXPIRY_HORIZON = 300n;

export const DEFAULT_SWEEP_BATCH = 25;

export interface SweepSchedulerDeps {
  lock: EngineLock;
  ledger: BetLedger;
  randomness: RandomnessSource;
}

export class SweepScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(
    private readonly deps: SweepSchedulerDeps,
    readonly expiryHorizon: bigint = DEFAULT_EXPIRY_HORIZON,
  ) {
    if (expiryHorizon <= deps.randomness.window) {
      throw new Error(
        `[sweep] Expiry horizon ${expiryHorizon} must exceed the randomness window ${deps.randomness.window}`,
      );
    }
  }

  /** Whether a bet placed at `originBlock` is past the horizon at `current`. */
  isExpired(originBlock: bigint, current: bigint): boolean {
    return current - originBlock > this.expiryHorizon;
  }

  /**
   * Expire up to `maxCount` pending bets that are past the horizon, crediting
   * each stake to the pool. Returns how many were swept.
   */
  async sweepExpired(maxCount: number): Promise<number> {
    if (!Number.isInteger(maxCount) || maxCount <= 0) {
      throw new EngineError('InvalidAmount', `maxCount must be a positive integer, got ${maxCount}`);
    }

    return this.deps.lock.run('sweepExpired', async () => {
      const current = await this.deps.randomness.currentPosition();

      const due: bigint[] = [];
      for (const bet of this.deps.ledger.pendingInOrder()) {
        if (due.length >= maxCount) break;
        // Origins grow with ids, so the first live bet ends the expired prefix.
        if (!this.isExpired(bet.originBlock, current)) break;
        due.push(bet.id);
      }

      for (const betId of due) this.deps.ledger.expireBet(betId);

      if (due.length > 0) {
        console.log(
          `[sweep] Expired ${due.length} bet(s) ${due[0]}..${due[due.length - 1]} at block ${current}`,
        );
      }
      return due.length;
    });
  }

  // ── Background loop ──────────────────────────────────────────

  /** Sweep every `intervalMs` until stop(). Failures are logged, not thrown. */
  start(intervalMs: number, batchSize: number = DEFAULT_SWEEP_BATCH): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.running) return;
      this.running = true;
      this.sweepExpired(batchSize)
        .catch((err: unknown) => {
          console.error('[sweep] Sweep failed:', err);
        })
        .finally(() => {
          this.running = false;
        });
    }, intervalMs);
    // Never keep the process alive on our account.
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get active(): boolean {
    return this.timer !== null;
  }
}
