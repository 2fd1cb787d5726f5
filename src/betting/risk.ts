/**
 * DICEPOOL - Risk Limiter
 *
 * Kelly-style ceiling on a single bet: the pool risks at most `edge` of its
 * balance per unit of net multiplier.
 *
 *   maxBet = pool * edge / (multiplier - 1)
 *
 * e.g. pool 10000, edge 1%, target 50% (2x) -> 10000 * 0.01 / 1 = 100.
 */

import { EngineError } from './errors';
import { multiplier } from './odds';
import { SCALE, mulDiv } from './math';

/**
 * Floor for (multiplier - 1). Odds near 100% would otherwise drive the
 * ceiling toward infinity; this caps it at a 1.01x multiplier.
 */
export const MIN_RISK_DENOMINATOR = SCALE / 100n;

export function maxBet(poolBalance: bigint, target: bigint, edge: bigint): bigint {
  if (target === 0n || target >= SCALE) {
    throw new EngineError(
      'DivisionByZeroOdds',
      `Risk limit undefined for target odds ${target}`,
    );
  }
  if (poolBalance === 0n) return 0n;

  const net = multiplier(target) - SCALE;
  const denominator = net < MIN_RISK_DENOMINATOR ? MIN_RISK_DENOMINATOR : net;
  return mulDiv(poolBalance, edge, denominator);
}
