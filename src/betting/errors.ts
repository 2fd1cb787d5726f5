/**
 * DICEPOOL - Engine Errors
 *
 * Every failure the engine surfaces carries a typed code so callers can tell
 * "wait and retry" (TooEarly) from "resubmit" (ExceedsRiskLimit) from
 * "treat as lost" (ResultExpired). No code leaves partial state behind.
 */

export type EngineErrorCode =
  | 'InvalidAmount'
  | 'InvalidOdds'
  | 'ExceedsRiskLimit'
  | 'Unauthorized'
  | 'TooEarly'
  | 'ResultExpired'
  | 'AlreadySettled'
  | 'InsufficientLiquidity'
  | 'DivisionByZeroOdds'
  | 'BetNotFound'
  | 'InvalidHouseEdge'
  | 'InsufficientShares'
  | 'InsufficientBalance'
  | 'ArithmeticOverflow'
  | 'Reentrancy'
  | 'TransferFailed';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  if (!(err instanceof EngineError)) return false;
  return code === undefined || err.code === code;
}
