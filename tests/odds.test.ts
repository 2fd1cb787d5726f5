#!/usr/bin/env tsx
/**
 * DICEPOOL - Odds & Risk Tests
 *
 * Validates:
 *   - Fixed-point helpers (mulDiv bounds, decimal parsing)
 *   - Adjusted odds, thresholds and payouts (pure functions)
 *   - Kelly max-bet ceiling
 *   - Empirical win rate against simulated block hashes
 *
 * Run: npx tsx tests/odds.test.ts
 */

import {
  HASH_DOMAIN,
  MAX_UINT256,
  SCALE,
  formatPercent,
  mulDiv,
  parseScaled,
} from '../src/betting/math';
import {
  adjustedOdds,
  isWinner,
  multiplier,
  outcomeOf,
  payout,
  resolveBet,
  threshold,
} from '../src/betting/odds';
import { MIN_RISK_DENOMINATOR, maxBet } from '../src/betting/risk';
import { SimulatedChain } from '../src/chain/simulated';
import {
  PCT,
  assert,
  assertApprox,
  assertEqual,
  assertThrows,
  run,
  section,
} from './helpers';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Fixed Point
// ═══════════════════════════════════════════════════════════════════════════════

function testMulDiv(): void {
  section('Math: mulDiv');

  assertEqual(mulDiv(10n, 3n, 4n), 7n, 'floor(10 * 3 / 4) = 7');
  assertEqual(mulDiv(MAX_UINT256, 2n, 2n), MAX_UINT256, 'Intermediate product may exceed 256 bits');
  assertThrows(() => mulDiv(MAX_UINT256, 2n, 1n), 'ArithmeticOverflow', 'Result above uint256 overflows');
  assertThrows(() => mulDiv(1n, 1n, 0n), 'ArithmeticOverflow', 'Division by zero is rejected');
  assertThrows(() => mulDiv(-1n, 1n, 1n), 'ArithmeticOverflow', 'Negative operands are rejected');
}

function testParseScaled(): void {
  section('Math: parseScaled / formatPercent');

  assertEqual(parseScaled('1'), SCALE, '"1" is SCALE');
  assertEqual(parseScaled('0.5'), SCALE / 2n, '"0.5" is half of SCALE');
  assertEqual(parseScaled('0.015'), 15n * 10n ** 15n, '"0.015" parses exactly');
  assertEqual(parseScaled(' 0.01 '), PCT, 'Surrounding whitespace is ignored');
  assertThrows(() => parseScaled('abc'), 'InvalidOdds', 'Non-numeric input is rejected');
  assertThrows(() => parseScaled('0.1234567890123456789'), 'InvalidOdds', 'More than 18 decimals is rejected');

  assertEqual(formatPercent(PCT), '1.00%', '1e16 formats as 1.00%');
  assertEqual(formatPercent(SCALE / 2n), '50.00%', '0.5e18 formats as 50.00%');
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Odds Engine
// ═══════════════════════════════════════════════════════════════════════════════

function testAdjustedOdds(): void {
  section('Odds: adjustedOdds');

  assertEqual(adjustedOdds(SCALE / 2n, PCT), 495n * 10n ** 15n, '50% with 1% edge -> 49.5%');
  assertEqual(adjustedOdds(SCALE / 2n, 0n), SCALE / 2n, 'Zero edge leaves odds unchanged');
  assertEqual(adjustedOdds(SCALE / 2n, SCALE), 0n, '100% edge leaves no chance');
  assertThrows(() => adjustedOdds(SCALE / 2n, SCALE + 1n), 'InvalidHouseEdge', 'Edge above 100% is rejected');
}

function testThreshold(): void {
  section('Odds: threshold / isWinner');

  const half = 2n ** 255n;
  assertEqual(threshold(SCALE / 2n, 0n), half, '50% without edge maps to 2^255');
  assert(isWinner(half - 1n, SCALE / 2n, 0n), 'Outcome just below threshold wins');
  assert(!isWinner(half, SCALE / 2n, 0n), 'Outcome equal to threshold loses');
  assert(!isWinner(0n, SCALE / 2n, SCALE), 'Nothing wins under a 100% edge');
  assert(isWinner(0n, PCT, PCT), 'Outcome 0 wins at any non-zero adjusted odds');

  const t95 = threshold(95n * PCT, 0n);
  assert(t95 < HASH_DOMAIN, '95% threshold stays inside the hash domain');
  assert(!isWinner(MAX_UINT256, 95n * PCT, 0n), 'Maximum outcome loses at 95%');
}

function testPayout(): void {
  section('Odds: payout / multiplier');

  assertEqual(payout(100n, SCALE / 2n), 200n, '100 at 50% pays 200 (2x)');
  assertEqual(payout(100n, SCALE / 4n), 400n, '100 at 25% pays 400 (4x)');
  assertEqual(payout(100n, SCALE / 10n), 1000n, '100 at 10% pays 1000 (10x)');
  assertEqual(payout(100n, 3n * 10n ** 17n), 333n, '100 at 30% rounds down to 333');
  assertEqual(multiplier(SCALE / 2n), 2n * SCALE, 'Multiplier at 50% is 2x');
  assertThrows(() => payout(100n, 0n), 'DivisionByZeroOdds', 'Payout at zero odds fails');
  assertThrows(() => multiplier(0n), 'DivisionByZeroOdds', 'Multiplier at zero odds fails');
}

function testOutcome(): void {
  section('Odds: outcomeOf / resolveBet');

  const hash = '0x1111111111111111111111111111111111111111111111111111111111111111';
  const a = outcomeOf(1n, hash);
  assertEqual(outcomeOf(1n, hash), a, 'Outcome is deterministic');
  assert(outcomeOf(2n, hash) !== a, 'Bets sharing a block hash get different outcomes');
  assert(a >= 0n && a <= MAX_UINT256, 'Outcome is a uint256');

  const result = resolveBet(1n, hash, 100n, SCALE / 2n, PCT);
  assertEqual(result.payout, 200n, 'Payout is computed whether or not the bet won');
  assertEqual(result.won, isWinner(a, SCALE / 2n, PCT), 'won matches isWinner on the raw outcome');
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Risk Limiter
// ═══════════════════════════════════════════════════════════════════════════════

function testMaxBet(): void {
  section('Risk: maxBet');

  assertEqual(maxBet(10_000n, SCALE / 2n, PCT), 100n, 'Pool 10000, 1% edge, 2x -> 100');
  assertEqual(maxBet(10_000n, SCALE / 4n, PCT), 33n, 'Pool 10000, 1% edge, 4x -> 33');
  assertEqual(
    maxBet(10_000n * SCALE, SCALE / 4n, PCT),
    33_333_333_333_333_333_333n,
    '18-decimal pool keeps precision',
  );
  assertEqual(maxBet(0n, SCALE / 2n, PCT), 0n, 'Empty pool allows nothing');
  assertEqual(maxBet(10_000n, 99n * PCT, PCT), 9900n, '99% odds use the real net multiplier');
  assertEqual(
    maxBet(10_000n, 995n * 10n ** 15n, PCT),
    10_000n,
    'Net multiplier below 1.01x is clamped',
  );
  assertEqual(MIN_RISK_DENOMINATOR, PCT, 'Clamp floor is 0.01');
  assertThrows(() => maxBet(10_000n, 0n, PCT), 'DivisionByZeroOdds', 'Zero odds fail');
  assertThrows(() => maxBet(10_000n, SCALE, PCT), 'DivisionByZeroOdds', '100% odds fail');
}

function testMaxBetMonotonic(): void {
  section('Risk: monotonicity');

  let previous = 0n;
  let ordered = true;
  for (let pct = 5n; pct <= 95n; pct += 5n) {
    const limit = maxBet(1_000_000n, pct * PCT, PCT);
    if (limit < previous) ordered = false;
    previous = limit;
  }
  assert(ordered, 'Higher odds never lower the ceiling');

  assert(
    maxBet(20_000n, SCALE / 2n, PCT) > maxBet(10_000n, SCALE / 2n, PCT),
    'A larger pool raises the ceiling',
  );
  assert(
    maxBet(10_000n, SCALE / 2n, 2n * PCT) > maxBet(10_000n, SCALE / 2n, PCT),
    'A larger edge raises the ceiling',
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// TEST SUITE: Fairness
// ═══════════════════════════════════════════════════════════════════════════════

async function testEmpiricalWinRate(): Promise<void> {
  section('Fairness: empirical win rate');

  const chain = new SimulatedChain({ seed: 'fairness' });
  chain.advance(50n);

  for (const target of [SCALE / 2n, SCALE / 10n]) {
    let wins = 0;
    let total = 0;
    for (let origin = 0n; origin < 40n; origin++) {
      const reading = await chain.readAfter(origin);
      if (reading.state !== 'available') continue;
      for (let i = 0n; i < 100n; i++) {
        const betId = origin * 100n + i + 1n;
        if (resolveBet(betId, reading.hash, 100n, target, PCT).won) wins++;
        total++;
      }
    }
    const expected = Number(adjustedOdds(target, PCT)) / 1e18;
    assertEqual(total, 4000, 'Every origin had a readable hash');
    assertApprox(wins / total, expected, 0.03, `Win rate tracks ${formatPercent(target)} less the edge`);
  }
}

run('Odds & Risk Tests', async () => {
  testMulDiv();
  testParseScaled();
  testAdjustedOdds();
  testThreshold();
  testPayout();
  testOutcome();
  testMaxBet();
  testMaxBetMonotonic();
  await testEmpiricalWinRate();
});
