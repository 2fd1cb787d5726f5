/**
 * DICEPOOL - Betting Module
 *
 * Odds, risk limits, the bet ledger and the expiry sweep.
 */

export { EngineError, isEngineError } from './errors';
export type { EngineErrorCode } from './errors';

export { SCALE, MAX_UINT256, HASH_DOMAIN, mulDiv, parseScaled, fromScaled, formatPercent } from './math';

export {
  adjustedOdds,
  threshold,
  isWinner,
  payout,
  multiplier,
  outcomeOf,
  resolveBet,
} from './odds';
export type { BetResult } from './odds';

export { maxBet, MIN_RISK_DENOMINATOR } from './risk';

export { BetLedger } from './ledger';
export type { Bet, BetStatus, ClaimResult, LedgerLimits, BetLedgerDeps } from './ledger';

export { SweepScheduler, DEFAULT_EXPIRY_HORIZON, DEFAULT_SWEEP_BATCH } from './sweep';
export type { SweepSchedulerDeps } from './sweep';
