#!/usr/bin/env tsx
/**
 * DICEPOOL - CLI House Simulation
 *
 * Runs a few thousand bets against an in-process engine on a simulated chain
 * and prints how the pool drifted compared to the configured house edge.
 * Some players never come back to claim, so the sweep gets exercised too.
 *
 * Usage:
 *   npx tsx scripts/simulate.ts
 *   npm run simulate
 *
 * Environment variables (optional):
 *   SIM_BETS=2000      - Number of bets to place
 *   SIM_LIQUIDITY=1000000 - Initial pool stake
 *   CHAIN_SEED, HOUSE_EDGE, ... - Same as the server, see src/config.ts
 */

import 'dotenv/config';

import type { Address } from 'viem';
import { getAddress } from 'viem';
import { loadConfig } from '../src/config';
import { createEngine, limitsFromConfig } from '../src/engine';
import { SimulatedChain } from '../src/chain/simulated';
import { MemoryTokenClient } from '../src/chain/token-client';
import { SCALE, formatPercent, fromScaled } from '../src/betting/math';
import { adjustedOdds } from '../src/betting/odds';
import { isEngineError } from '../src/betting/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Utilities
// ═══════════════════════════════════════════════════════════════════════════════

const C = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  brightGreen: '\x1b[92m',
  brightRed: '\x1b[91m',
  brightWhite: '\x1b[97m',
} as const;

function c(color: keyof typeof C, text: string): string {
  return `${C[color]}${text}${C.reset}`;
}

function printSectionHeader(text: string): void {
  const line = '═'.repeat(60);
  console.log('');
  console.log(c('yellow', `  ${line}`));
  console.log(c('yellow', `  ${c('bold', text)}`));
  console.log(c('yellow', `  ${line}`));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Setup
// ═══════════════════════════════════════════════════════════════════════════════

const ODDS_CHOICES = [10n, 25n, 50n, 75n, 90n].map((pct) => (pct * SCALE) / 100n);
const FORGET_RATE = 0.05;

interface Tally {
  placed: number;
  won: number;
  volume: bigint;
}

function player(i: number): Address {
  return getAddress(`0x${(0xbe7 + i).toString(16).padStart(40, '0')}`);
}

function pick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

async function simulate(): Promise<void> {
  const config = loadConfig();
  const totalBets = Number(process.env.SIM_BETS ?? '2000');
  const liquidity = BigInt(process.env.SIM_LIQUIDITY ?? '1000000');

  const chain = new SimulatedChain({ seed: config.CHAIN_SEED, window: config.RANDOMNESS_WINDOW });
  const token = new MemoryTokenClient();
  const engine = createEngine({
    randomness: chain,
    token,
    limits: limitsFromConfig(config),
    houseEdge: config.HOUSE_EDGE,
    expiryHorizon: config.EXPIRY_HORIZON,
  });
  const { ledger, pool, sweeper } = engine;

  // The engine logs every operation; keep the report readable.
  const savedLog = console.log;
  console.log = () => {};

  const house = player(0);
  token.mint(house, liquidity);
  await pool.stake(house, liquidity);

  const players = Array.from({ length: 8 }, (_, i) => player(i + 1));
  for (const p of players) token.mint(p, liquidity);

  const tallies = new Map<bigint, Tally>();
  const open: bigint[] = [];
  let forgotten = 0;
  let rejected = 0;

  for (let n = 0; n < totalBets; n++) {
    const owner = pick(players);
    const odds = pick(ODDS_CHOICES);
    const ceiling = ledger.getMaxBet(odds);
    const amount = (ceiling * BigInt(1 + Math.floor(Math.random() * 100))) / 100n;

    try {
      const id = await ledger.placeBet(owner, amount, odds);
      const tally = tallies.get(odds) ?? { placed: 0, won: 0, volume: 0n };
      tally.placed++;
      tally.volume += amount;
      tallies.set(odds, tally);
      if (Math.random() < FORGET_RATE) forgotten++;
      else open.push(id);
    } catch (err) {
      if (!isEngineError(err)) throw err;
      rejected++;
    }

    chain.advance();

    // Claim everything whose resolving block is final.
    while (open.length > 0) {
      const bet = ledger.getBet(open[0]);
      if (chain.head <= bet.originBlock + 1n) break;
      open.shift();
      const result = await ledger.claim(bet.owner, bet.id);
      if (result.won) {
        const tally = tallies.get(bet.targetOdds);
        if (tally) tally.won++;
      }
    }
  }

  chain.advance(config.EXPIRY_HORIZON + 2n);
  let swept = 0;
  for (;;) {
    const batch = await sweeper.sweepExpired(config.SWEEP_BATCH_SIZE);
    if (batch === 0) break;
    swept += batch;
  }

  console.log = savedLog;

  // ═════════════════════════════════════════════════════════════════════════════
  // Report
  // ═════════════════════════════════════════════════════════════════════════════

  printSectionHeader('DICEPOOL - House Simulation');
  console.log(`  Bets placed      ${c('brightWhite', String(totalBets - rejected))}  ${c('gray', `(${rejected} rejected)`)}`);
  console.log(`  House edge       ${c('brightWhite', formatPercent(ledger.houseEdge()))}`);
  console.log(`  Unclaimed/swept  ${c('brightWhite', `${forgotten}/${swept}`)}`);

  printSectionHeader('WIN RATE BY ODDS');
  let volume = 0n;
  for (const odds of ODDS_CHOICES) {
    const tally = tallies.get(odds);
    if (!tally || tally.placed === 0) continue;
    volume += tally.volume;
    const rate = tally.won / tally.placed;
    const expected = fromScaled(adjustedOdds(odds, ledger.houseEdge()));
    const color: keyof typeof C = Math.abs(rate - expected) < 0.05 ? 'green' : 'red';
    console.log(
      `    ${formatPercent(odds).padStart(7)}  ${String(tally.placed).padStart(5)} bets  ` +
        `${c(color, `${(rate * 100).toFixed(2)}%`)} won  ${c('gray', `expected ${(expected * 100).toFixed(2)}%`)}`,
    );
  }

  printSectionHeader('POOL');
  const end = pool.assets;
  const pnl = end - liquidity;
  const expectedPnl = Number(volume) * fromScaled(ledger.houseEdge());
  console.log(`  Start            ${liquidity}`);
  console.log(`  End              ${end}`);
  console.log(`  Profit           ${c(pnl >= 0n ? 'brightGreen' : 'brightRed', pnl.toString())}  ${c('gray', `(edge on volume ~ ${expectedPnl.toFixed(0)})`)}`);
  console.log(`  Share price      ${fromScaled(pool.sharePrice()).toFixed(6)}`);
  console.log(`  Escrow left      ${ledger.escrowed()}  ${c('gray', `pending ${ledger.pendingCount()}`)}`);
  console.log('');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run
// ═══════════════════════════════════════════════════════════════════════════════

simulate().catch((err: unknown) => {
  console.error('\n\x1b[91mFATAL ERROR:\x1b[0m', err);
  process.exit(1);
});
