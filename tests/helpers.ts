/**
 * DICEPOOL - Test Utilities
 *
 * Shared assert/section/report helpers for the tsx test scripts, plus a
 * factory for an engine on a simulated chain with in-memory balances.
 */

import { getAddress, type Address } from 'viem';
import { isEngineError, type EngineErrorCode } from '../src/betting/errors';
import { SCALE } from '../src/betting/math';
import type { LedgerLimits } from '../src/betting/ledger';
import { SimulatedChain } from '../src/chain/simulated';
import { MemoryTokenClient } from '../src/chain/token-client';
import { createEngine, type Engine } from '../src/engine';

// ─── Assertions ──────────────────────────────────────────────────────────────

let passed = 0;
let failed = 0;
const failures: string[] = [];

export function assert(condition: boolean, message: string): void {
  if (!condition) {
    failed++;
    failures.push(message);
    console.log(`  FAIL: ${message}`);
  } else {
    passed++;
    console.log(`  PASS: ${message}`);
  }
}

export function assertEqual<T>(actual: T, expected: T, message: string): void {
  const ok = Object.is(actual, expected);
  assert(ok, ok ? message : `${message} (actual: ${String(actual)}, expected: ${String(expected)})`);
}

export function assertApprox(actual: number, expected: number, tolerance: number, message: string): void {
  assert(
    Math.abs(actual - expected) <= tolerance,
    `${message} (actual: ${actual}, expected: ${expected}, tolerance: ${tolerance})`,
  );
}

function describeError(err: unknown): string {
  if (isEngineError(err)) return err.code;
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Asserts `fn` throws an EngineError with `code`. */
export function assertThrows(fn: () => unknown, code: EngineErrorCode, message: string): void {
  try {
    fn();
  } catch (err) {
    assert(isEngineError(err, code), `${message} (got ${describeError(err)})`);
    return;
  }
  assert(false, `${message} (did not throw)`);
}

/** Asserts the promise rejects with an EngineError carrying `code`. */
export async function assertRejects(
  promise: Promise<unknown>,
  code: EngineErrorCode,
  message: string,
): Promise<void> {
  try {
    await promise;
  } catch (err) {
    assert(isEngineError(err, code), `${message} (got ${describeError(err)})`);
    return;
  }
  assert(false, `${message} (resolved)`);
}

export function section(name: string): void {
  console.log(`\n--- ${name} ---`);
}

/** Print the summary and exit non-zero when anything failed. */
export function report(title: string): void {
  console.log('\n=========================');
  console.log(`${title}: ${passed} passed, ${failed} failed`);

  if (failures.length > 0) {
    console.log('\nFAILURES:');
    for (const f of failures) {
      console.log(`  - ${f}`);
    }
    process.exit(1);
  } else {
    console.log('All tests passed!');
  }
}

/** Entry point for an async suite; an unexpected throw fails the run. */
export function run(title: string, suite: () => Promise<void>): void {
  console.log(`DICEPOOL - ${title}`);
  console.log('=========================');
  suite()
    .then(() => report('RESULTS'))
    .catch((err: unknown) => {
      console.error('\nUnexpected error:', err);
      process.exit(1);
    });
}

// ─── Fixtures ────────────────────────────────────────────────────────────────

function addr(tail: string): Address {
  return getAddress(`0x${tail.padStart(40, '0')}`);
}

export const ALICE = addr('a11ce');
export const BOB = addr('b0b');
export const LP = addr('1111');
export const OPERATOR = addr('0e7a');

export const PCT = SCALE / 100n;

export const DEFAULT_LIMITS: LedgerLimits = {
  minBet: 1n,
  minOdds: PCT,
  maxOdds: 95n * PCT,
  maxHouseEdge: 10n * PCT,
  operator: OPERATOR,
};

export interface TestEngine extends Engine {
  chain: SimulatedChain;
  token: MemoryTokenClient;
}

export interface TestEngineOptions {
  /** Staked by LP before the engine is returned. */
  liquidity?: bigint;
  houseEdge?: bigint;
  limits?: Partial<LedgerLimits>;
  window?: bigint;
  expiryHorizon?: bigint;
  seed?: string;
}

export async function createTestEngine(options: TestEngineOptions = {}): Promise<TestEngine> {
  const chain = new SimulatedChain({ seed: options.seed ?? 'test-seed', window: options.window });
  const token = new MemoryTokenClient();
  const engine = createEngine({
    randomness: chain,
    token,
    limits: { ...DEFAULT_LIMITS, ...options.limits },
    houseEdge: options.houseEdge ?? PCT,
    expiryHorizon: options.expiryHorizon,
  });

  const liquidity = options.liquidity ?? 0n;
  if (liquidity > 0n) {
    token.mint(LP, liquidity);
    await engine.pool.stake(LP, liquidity);
  }

  return { ...engine, chain, token };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
