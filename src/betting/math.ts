/**
 * DICEPOOL - Fixed-Point Arithmetic
 *
 * All odds, edges and prices use a single 1e18 scale. Values are bigints
 * bounded to the unsigned 256-bit range, so every multiply-then-divide is
 * checked against that range.
 */

import { EngineError } from './errors';

export const SCALE = 10n ** 18n;

export const MAX_UINT256 = 2n ** 256n - 1n;

/** Size of the randomness hash domain (outcomes are 0..2^256-1). */
export const HASH_DOMAIN = 2n ** 256n;

function checkRange(value: bigint, label: string): void {
  if (value < 0n) {
    throw new EngineError('ArithmeticOverflow', `${label} is negative`);
  }
  if (value > MAX_UINT256) {
    throw new EngineError('ArithmeticOverflow', `${label} exceeds uint256`);
  }
}

/**
 * floor(a * b / d). The intermediate product may exceed 256 bits (the way
 * a full-width mulDiv does); inputs and the result may not.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  checkRange(a, 'mulDiv operand');
  checkRange(b, 'mulDiv operand');
  if (d <= 0n) {
    throw new EngineError('ArithmeticOverflow', 'mulDiv by zero');
  }
  const result = (a * b) / d;
  checkRange(result, 'mulDiv result');
  return result;
}

/**
 * Parse a decimal string such as "0.5" or "0.015" into a 1e18-scaled bigint
 * without going through floats. At most 18 decimals.
 */
export function parseScaled(decimal: string): bigint {
  const match = /^(\d+)(?:\.(\d{1,18}))?$/.exec(decimal.trim());
  if (!match) {
    throw new EngineError('InvalidOdds', `Not a decimal fraction: "${decimal}"`);
  }
  const whole = BigInt(match[1]);
  const fraction = (match[2] ?? '').padEnd(18, '0');
  return whole * SCALE + BigInt(fraction);
}

/** 1e18-scaled bigint to a float, for display only. */
export function fromScaled(value: bigint): number {
  return Number(value) / 1e18;
}

export function formatPercent(value: bigint): string {
  return `${(fromScaled(value) * 100).toFixed(2)}%`;
}
