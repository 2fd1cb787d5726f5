/**
 * DICEPOOL - Bet Ledger
 *
 * Owns every bet record and drives the bet lifecycle:
 *
 *   placeBet  -> Pending
 *   claim     -> Claimed (won, payout sent) | Lost (stake credited to pool)
 *   sweep     -> Expired (stake credited to pool)
 *
 * Records are never deleted; settled ones answer later claims with
 * AlreadySettled. Stakes of pending bets sit in escrow, outside the pool,
 * until settlement.
 */

import { getAddress, type Address } from 'viem';
import { EngineError } from './errors';
import { resolveBet, type BetResult } from './odds';
import { maxBet } from './risk';
import { formatPercent } from './math';
import type { EngineLock } from '../engine/lock';
import type { EventBus } from '../engine/events';
import type { LiquidityPool } from '../vault/pool';
import type { RandomnessSource } from '../chain/randomness';
import type { TokenClient } from '../chain/token-client';

// ─── Types ───────────────────────────────────────────────────────

/**
 * Won is never stored: a winning claim pays out and lands on Claimed in the
 * same operation. It stays in the union for clients reading outcomes.
 */
export type BetStatus = 'Pending' | 'Won' | 'Lost' | 'Claimed' | 'Expired';

export interface Bet {
  id: bigint;
  owner: Address;
  amount: bigint;
  /** Requested win probability, 1e18-scaled. */
  targetOdds: bigint;
  /** House edge in force when the bet was accepted; resolution uses it. */
  houseEdge: bigint;
  /** Ordering position the bet was accepted at. */
  originBlock: bigint;
  status: BetStatus;
}

export interface ClaimResult {
  betId: bigint;
  won: boolean;
  /** Amount sent to the owner; 0 for a lost bet. */
  paid: bigint;
  status: BetStatus;
}

export interface LedgerLimits {
  minBet: bigint;
  minOdds: bigint;
  maxOdds: bigint;
  /** Hard ceiling for setHouseEdge. */
  maxHouseEdge: bigint;
  /** The only account allowed to change the house edge; null disables changes. */
  operator: Address | null;
}

export interface BetLedgerDeps {
  lock: EngineLock;
  pool: LiquidityPool;
  randomness: RandomnessSource;
  token: TokenClient;
  events: EventBus;
}

// ─── Class ───────────────────────────────────────────────────────

export class BetLedger {
  private readonly bets = new Map<bigint, Bet>();
  /** Pending bets in id order. Entries leave on settlement. */
  private readonly pending = new Map<bigint, Bet>();
  private nextId = 1n;
  private edge: bigint;
  private escrow = 0n;

  constructor(
    private readonly deps: BetLedgerDeps,
    readonly limits: LedgerLimits,
    initialHouseEdge: bigint,
  ) {
    if (initialHouseEdge <= 0n || initialHouseEdge > limits.maxHouseEdge) {
      throw new EngineError(
        'InvalidHouseEdge',
        `Initial house edge ${initialHouseEdge} outside (0, ${limits.maxHouseEdge}]`,
      );
    }
    if (limits.minOdds <= 0n || limits.minOdds > limits.maxOdds) {
      throw new EngineError('InvalidOdds', 'Odds band must satisfy 0 < minOdds <= maxOdds');
    }
    this.edge = initialHouseEdge;
  }

  // ── Reads ────────────────────────────────────────────────────

  houseEdge(): bigint {
    return this.edge;
  }

  getBet(betId: bigint): Bet {
    return { ...this.requireBet(betId) };
  }

  betsOf(owner: Address): Bet[] {
    const key = getAddress(owner);
    const result: Bet[] = [];
    for (const bet of this.bets.values()) {
      if (bet.owner === key) result.push({ ...bet });
    }
    return result;
  }

  getMaxBet(targetOdds: bigint): bigint {
    return maxBet(this.deps.pool.assets, targetOdds, this.edge);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /** Id the next accepted bet will get. */
  nextBetId(): bigint {
    return this.nextId;
  }

  /** Sum of stakes held for pending bets. */
  escrowed(): bigint {
    return this.escrow;
  }

  /** Pending bets, oldest first. */
  *pendingInOrder(): IterableIterator<Bet> {
    for (const bet of this.pending.values()) yield { ...bet };
  }

  /**
   * Outcome of a bet, without settling it. Fails with TooEarly until the
   * block after the bet's origin is final, and with ResultExpired once that
   * block's hash has left the randomness window.
   */
  async computeResult(betId: bigint): Promise<BetResult> {
    const bet = this.requireBet(betId);
    const reading = await this.deps.randomness.readAfter(bet.originBlock);

    if (reading.state === 'pending') {
      throw new EngineError(
        'TooEarly',
        `Bet ${betId} resolves after block ${bet.originBlock + 1n} is final`,
      );
    }
    if (reading.state === 'expired') {
      throw new EngineError(
        'ResultExpired',
        `Randomness for bet ${betId} is gone; it will be swept as expired`,
      );
    }
    return resolveBet(bet.id, reading.hash, bet.amount, bet.targetOdds, bet.houseEdge);
  }

  // ── Place a bet ──────────────────────────────────────────────

  /**
   * Accept a bet and take its stake into escrow.
   *
   * Rejects with InvalidAmount, InvalidOdds or ExceedsRiskLimit before any
   * collateral moves.
   */
  async placeBet(owner: Address, amount: bigint, targetOdds: bigint): Promise<bigint> {
    const player = getAddress(owner);

    return this.deps.lock.run('placeBet', async () => {
      const { minBet, minOdds, maxOdds } = this.limits;

      if (amount <= 0n || amount < minBet) {
        throw new EngineError('InvalidAmount', `Minimum bet is ${minBet}, got ${amount}`);
      }
      if (targetOdds < minOdds || targetOdds > maxOdds) {
        throw new EngineError(
          'InvalidOdds',
          `Odds must be within ${formatPercent(minOdds)}..${formatPercent(maxOdds)}`,
        );
      }
      const limit = maxBet(this.deps.pool.assets, targetOdds, this.edge);
      if (amount > limit) {
        throw new EngineError(
          'ExceedsRiskLimit',
          `Bet ${amount} exceeds max bet ${limit} at ${formatPercent(targetOdds)}`,
        );
      }

      await this.deps.token.pull(player, amount);

      // Read after the stake has landed, so the resolving block is still ahead.
      let originBlock: bigint;
      try {
        originBlock = await this.deps.randomness.currentPosition();
      } catch (err) {
        await this.deps.token.push(player, amount);
        throw err;
      }

      const bet: Bet = {
        id: this.nextId,
        owner: player,
        amount,
        targetOdds,
        houseEdge: this.edge,
        originBlock,
        status: 'Pending',
      };
      this.nextId += 1n;
      this.bets.set(bet.id, bet);
      this.pending.set(bet.id, bet);
      this.escrow += amount;

      console.log(
        `[BetLedger] Bet ${bet.id}: ${player} staked ${amount} at ${formatPercent(targetOdds)} (block ${originBlock})`,
      );
      this.deps.events.emit({
        type: 'bet_placed',
        data: { betId: bet.id, owner: player, amount, targetOdds, originBlock },
      });
      return bet.id;
    });
  }

  // ── Claim ────────────────────────────────────────────────────

  /**
   * Settle a bet. Exactly one of two paths runs:
   *
   * - won:  the pool funds the winnings above the stake, the stake leaves
   *         escrow, the full payout goes to the owner -> Claimed
   * - lost: the stake moves from escrow into the pool -> Lost
   *
   * A second claim on the same bet fails with AlreadySettled and changes nothing.
   */
  async claim(caller: Address, betId: bigint): Promise<ClaimResult> {
    const claimant = getAddress(caller);

    return this.deps.lock.run('claim', async () => {
      const bet = this.requireBet(betId);
      if (bet.owner !== claimant) {
        throw new EngineError('Unauthorized', `Bet ${betId} belongs to ${bet.owner}`);
      }
      if (bet.status !== 'Pending') {
        throw new EngineError('AlreadySettled', `Bet ${betId} is already ${bet.status}`);
      }

      const result = await this.computeResult(betId);

      if (!result.won) {
        this.deps.pool.creditLoss(bet.amount);
        this.settle(bet, 'Lost');
        console.log(`[BetLedger] Bet ${betId} lost; ${bet.amount} credited to pool`);
        this.deps.events.emit({
          type: 'bet_resolved',
          data: { betId, won: false, payout: 0n },
        });
        return { betId, won: false, paid: 0n, status: 'Lost' };
      }

      const winnings = result.payout - bet.amount;
      if (!this.deps.pool.canCover(winnings)) {
        throw new EngineError(
          'InsufficientLiquidity',
          `Pool holds ${this.deps.pool.assets}, bet ${betId} needs ${winnings}; retry after new stake`,
        );
      }

      await this.deps.token.push(bet.owner, result.payout);

      this.deps.pool.debitPayout(winnings);
      this.settle(bet, 'Claimed');
      console.log(`[BetLedger] Bet ${betId} won; paid ${result.payout} to ${bet.owner}`);
      this.deps.events.emit({
        type: 'bet_resolved',
        data: { betId, won: true, payout: result.payout },
      });
      this.deps.events.emit({
        type: 'bet_claimed',
        data: { betId, owner: bet.owner, payout: result.payout },
      });
      return { betId, won: true, paid: result.payout, status: 'Claimed' };
    });
  }

  // ── Expiry (driven by SweepScheduler) ──────────────────────────

  /** Forfeit a pending bet whose randomness can no longer be read. */
  expireBet(betId: bigint): void {
    this.deps.lock.assertHeld('expireBet');
    const bet = this.requireBet(betId);
    if (bet.status !== 'Pending') {
      throw new EngineError('AlreadySettled', `Bet ${betId} is already ${bet.status}`);
    }

    this.deps.pool.creditLoss(bet.amount);
    this.settle(bet, 'Expired');
    this.deps.events.emit({ type: 'bet_expired', data: { betId } });
  }

  // ── Admin ────────────────────────────────────────────────────

  async setHouseEdge(caller: Address, newEdge: bigint): Promise<void> {
    const sender = getAddress(caller);

    await this.deps.lock.run('setHouseEdge', async () => {
      const { operator } = this.limits;
      if (operator === null || sender !== getAddress(operator)) {
        throw new EngineError('Unauthorized', `${sender} is not the operator`);
      }
      if (newEdge <= 0n || newEdge > this.limits.maxHouseEdge) {
        throw new EngineError(
          'InvalidHouseEdge',
          `House edge must be within (0, ${formatPercent(this.limits.maxHouseEdge)}]`,
        );
      }

      const oldEdge = this.edge;
      this.edge = newEdge;
      console.log(
        `[BetLedger] House edge ${formatPercent(oldEdge)} -> ${formatPercent(newEdge)}`,
      );
      this.deps.events.emit({ type: 'house_edge_changed', data: { oldEdge, newEdge } });
    });
  }

  // ── Internals ────────────────────────────────────────────────

  private requireBet(betId: bigint): Bet {
    const bet = this.bets.get(betId);
    if (!bet) throw new EngineError('BetNotFound', `No bet with id ${betId}`);
    return bet;
  }

  private settle(bet: Bet, status: 'Lost' | 'Claimed' | 'Expired'): void {
    bet.status = status;
    this.pending.delete(bet.id);
    this.escrow -= bet.amount;
  }
}
