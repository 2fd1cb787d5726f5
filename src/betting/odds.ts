/**
 * DICEPOOL - Odds Engine
 *
 * Pure conversions between a requested win probability, the house edge,
 * the hash-domain threshold a bet must land under, and the payout.
 *
 * All probabilities are 1e18-scaled fractions:
 *   target  0.5e18  -> nominal 50% chance, 2x payout
 *   edge    0.01e18 -> 1% of the nominal chance is kept by the pool
 */

import { encodePacked, hexToBigInt, keccak256, type Hex } from 'viem';
import { EngineError } from './errors';
import { HASH_DOMAIN, SCALE, mulDiv } from './math';

// ─── Types ───────────────────────────────────────────────────────

export interface BetResult {
  won: boolean;
  /** What the owner receives if `won`; computed either way. */
  payout: bigint;
}

// ─── Core ────────────────────────────────────────────────────────

/** Real win probability after the house edge: target * (1 - edge). */
export function adjustedOdds(target: bigint, edge: bigint): bigint {
  if (edge > SCALE) {
    throw new EngineError('InvalidHouseEdge', `House edge ${edge} exceeds 100%`);
  }
  return mulDiv(target, SCALE - edge, SCALE);
}

/**
 * Adjusted probability mapped onto the 2^256 hash domain. A uniformly
 * distributed outcome lands below it with probability adjustedOdds / SCALE.
 */
export function threshold(target: bigint, edge: bigint): bigint {
  const adjusted = adjustedOdds(target, edge);
  // HASH_DOMAIN itself is one past uint256, so no mulDiv here.
  return (adjusted * HASH_DOMAIN) / SCALE;
}

export function isWinner(rawOutcome: bigint, target: bigint, edge: bigint): boolean {
  return rawOutcome < threshold(target, edge);
}

/** Gross payout for a win, stake included: amount / target. */
export function payout(amount: bigint, target: bigint): bigint {
  if (target === 0n) {
    throw new EngineError('DivisionByZeroOdds', 'Payout requested at zero odds');
  }
  return mulDiv(amount, SCALE, target);
}

/** Payout multiplier in 1e18 scale (2e18 at 50%). */
export function multiplier(target: bigint): bigint {
  if (target === 0n) {
    throw new EngineError('DivisionByZeroOdds', 'Multiplier requested at zero odds');
  }
  return mulDiv(SCALE, SCALE, target);
}

// ─── Outcome ─────────────────────────────────────────────────────

/**
 * Raw outcome for a bet: keccak256(betId ‖ blockHash) as a uint256.
 * Folding the id in gives bets that share an origin block independent results.
 */
export function outcomeOf(betId: bigint, blockHash: Hex): bigint {
  return hexToBigInt(keccak256(encodePacked(['uint256', 'bytes32'], [betId, blockHash])));
}

export function resolveBet(
  betId: bigint,
  blockHash: Hex,
  amount: bigint,
  target: bigint,
  edge: bigint,
): BetResult {
  const raw = outcomeOf(betId, blockHash);
  return {
    won: isWinner(raw, target, edge),
    payout: payout(amount, target),
  };
}
