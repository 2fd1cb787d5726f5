/**
 * DICEPOOL - Liquidity Pool
 *
 * Share-based accounting for the collateral that backs winning bets.
 * Stakers receive shares proportional to the pool at the moment they
 * deposit; settled losses raise the value of every share; winning claims
 * draw it down.
 *
 * The pool counts only collateral that arrived through its own operations.
 * Tokens sent straight to the custody account are ignored, and shares for a
 * deposit are priced from the totals captured *before* that deposit.
 */

import type { Address } from 'viem';
import { getAddress } from 'viem';
import { EngineError } from '../betting/errors';
import { SCALE, mulDiv } from '../betting/math';
import type { EngineLock } from '../engine/lock';
import type { EventBus } from '../engine/events';
import type { TokenClient } from '../chain/token-client';

// ─── Types ───────────────────────────────────────────────────────

export interface PoolSnapshot {
  totalAssets: bigint;
  totalShares: bigint;
  /** Assets per share, 1e18-scaled. SCALE for an empty pool. */
  sharePrice: bigint;
}

export interface StakePosition {
  account: Address;
  shares: bigint;
  /** What the shares would redeem for right now. */
  assets: bigint;
}

export interface LiquidityPoolDeps {
  lock: EngineLock;
  token: TokenClient;
  events: EventBus;
}

// ─── Class ───────────────────────────────────────────────────────

export class LiquidityPool {
  private totalAssets = 0n;
  private totalShares = 0n;
  private readonly balances = new Map<Address, bigint>();

  constructor(private readonly deps: LiquidityPoolDeps) {}

  // ── Reads ────────────────────────────────────────────────────

  get assets(): bigint {
    return this.totalAssets;
  }

  get shares(): bigint {
    return this.totalShares;
  }

  sharesOf(account: Address): bigint {
    return this.balances.get(getAddress(account)) ?? 0n;
  }

  position(account: Address): StakePosition {
    const shares = this.sharesOf(account);
    return {
      account: getAddress(account),
      shares,
      assets: shares === 0n ? 0n : this.previewUnstake(shares),
    };
  }

  sharePrice(): bigint {
    if (this.totalShares === 0n) return SCALE;
    return mulDiv(this.totalAssets, SCALE, this.totalShares);
  }

  snapshot(): PoolSnapshot {
    return {
      totalAssets: this.totalAssets,
      totalShares: this.totalShares,
      sharePrice: this.sharePrice(),
    };
  }

  /** Shares minted for `assets` at the current totals. */
  previewStake(assets: bigint): bigint {
    if (assets <= 0n) {
      throw new EngineError('InvalidAmount', `Stake must be positive, got ${assets}`);
    }
    let shares: bigint;
    if (this.totalShares === 0n) {
      shares = assets;
    } else {
      // A drained pool values all outstanding shares at a single unit, so
      // the new deposit is not diluted by worthless shares.
      const base = this.totalAssets === 0n ? 1n : this.totalAssets;
      shares = mulDiv(assets, this.totalShares, base);
    }
    if (shares === 0n) {
      throw new EngineError('InvalidAmount', `Stake of ${assets} would mint zero shares`);
    }
    return shares;
  }

  /** Assets returned for burning `shares` at the current totals. */
  previewUnstake(shares: bigint): bigint {
    if (shares <= 0n) {
      throw new EngineError('InvalidAmount', `Unstake must be positive, got ${shares}`);
    }
    if (shares > this.totalShares) {
      throw new EngineError(
        'InsufficientShares',
        `Only ${this.totalShares} shares outstanding, asked for ${shares}`,
      );
    }
    return mulDiv(shares, this.totalAssets, this.totalShares);
  }

  /** Whether a payout of `amount` can be funded right now. */
  canCover(amount: bigint): boolean {
    return amount <= this.totalAssets;
  }

  // ── Staking ──────────────────────────────────────────────────

  async stake(account: Address, assets: bigint): Promise<bigint> {
    const staker = getAddress(account);

    return this.deps.lock.run('stake', async () => {
      // Priced before the deposit is pulled or recorded.
      const shares = this.previewStake(assets);

      await this.deps.token.pull(staker, assets);

      this.totalAssets += assets;
      this.totalShares += shares;
      this.balances.set(staker, this.sharesOf(staker) + shares);

      console.log(`[pool] ${staker} staked ${assets} for ${shares} shares`);
      this.deps.events.emit({ type: 'staked', data: { account: staker, assets, shares } });
      return shares;
    });
  }

  async unstake(account: Address, shares: bigint): Promise<bigint> {
    const staker = getAddress(account);

    return this.deps.lock.run('unstake', async () => {
      const held = this.sharesOf(staker);
      if (shares > held) {
        throw new EngineError(
          'InsufficientShares',
          `${staker} holds ${held} shares, asked to burn ${shares}`,
        );
      }

      const assets = this.previewUnstake(shares);
      if (assets > this.totalAssets) {
        throw new EngineError(
          'InsufficientLiquidity',
          `Pool holds ${this.totalAssets}, redemption needs ${assets}`,
        );
      }

      await this.deps.token.push(staker, assets);

      this.totalAssets -= assets;
      this.totalShares -= shares;
      const remaining = held - shares;
      if (remaining === 0n) this.balances.delete(staker);
      else this.balances.set(staker, remaining);

      console.log(`[pool] ${staker} burned ${shares} shares for ${assets}`);
      this.deps.events.emit({ type: 'unstaked', data: { account: staker, assets, shares } });
      return assets;
    });
  }

  // ── Settlement (called by the ledger inside its own operation) ───

  /** Add a settled losing stake. No shares are minted, so the share price rises. */
  creditLoss(amount: bigint): void {
    this.deps.lock.assertHeld('creditLoss');
    if (amount <= 0n) {
      throw new EngineError('InvalidAmount', `Loss credit must be positive, got ${amount}`);
    }
    this.totalAssets += amount;
  }

  /** Fund a winning claim. Pool ruin surfaces as InsufficientLiquidity. */
  debitPayout(amount: bigint): void {
    this.deps.lock.assertHeld('debitPayout');
    if (amount < 0n) {
      throw new EngineError('InvalidAmount', `Payout must not be negative, got ${amount}`);
    }
    if (!this.canCover(amount)) {
      throw new EngineError(
        'InsufficientLiquidity',
        `Pool holds ${this.totalAssets}, payout needs ${amount}`,
      );
    }
    this.totalAssets -= amount;
  }
}
