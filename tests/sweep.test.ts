#!/usr/bin/env tsx
/**
 * DICEPOOL - Expiry Sweep Tests
 *
 * Validates:
 *   - Bets past the horizon are swept exactly once, oldest first
 *   - maxCount bounds each batch
 *   - A bet whose result is still readable is never swept
 *   - Horizon must exceed the randomness window
 *   - Background loop start/stop
 *
 * Run: npx tsx tests/sweep.test.ts
 */

import { SCALE } from '../src/betting/math';
import { SweepScheduler } from '../src/betting/sweep';
import {
  ALICE,
  assert,
  assertEqual,
  assertRejects,
  createTestEngine,
  run,
  section,
  sleep,
  type TestEngine,
} from './helpers';

const HALF = SCALE / 2n;

/** Five 10-unit bets at origins 1..5; head ends at 6. */
async function engineWithStaggeredBets(): Promise<TestEngine> {
  const engine = await createTestEngine({ liquidity: 10_000n });
  engine.token.mint(ALICE, 1_000n);
  for (let i = 0; i < 5; i++) {
    await engine.ledger.placeBet(ALICE, 10n, HALF);
    engine.chain.advance();
  }
  return engine;
}

async function testHorizon(): Promise<void> {
  section('Sweep: horizon arithmetic');

  const { sweeper } = await createTestEngine();
  assertEqual(sweeper.expiryHorizon, 300n, 'Default horizon is 300 blocks');
  assert(!sweeper.isExpired(1n, 301n), 'Exactly 300 blocks old is not expired');
  assert(sweeper.isExpired(1n, 302n), '301 blocks old is expired');
}

async function testSweepOnce(): Promise<void> {
  section('Sweep: exactly once, bounded batches');

  const { ledger, chain, pool, sweeper, events } = await engineWithStaggeredBets();
  chain.advance(298n);
  assertEqual(chain.head, 304n, 'Head at 304');

  assertEqual(await sweeper.sweepExpired(2), 2, 'First batch capped at 2');
  assertEqual(ledger.pendingCount(), 3, 'Three still pending');
  assertEqual(ledger.getBet(1n).status, 'Expired', 'Oldest bet swept first');
  assertEqual(ledger.getBet(3n).status, 'Pending', 'Third bet waits for the next batch');

  assertEqual(await sweeper.sweepExpired(10), 1, 'Second batch takes the remaining expired bet');
  assertEqual(await sweeper.sweepExpired(10), 0, 'Nothing left to sweep');
  assertEqual(ledger.getBet(4n).status, 'Pending', 'Bet 300 blocks old is left alone');

  assertEqual(pool.assets, 10_030n, 'Three forfeited stakes credited to the pool');
  assertEqual(ledger.escrowed(), 20n, 'Two stakes still escrowed');
  const expired = events.since(0, 1000).filter((r) => r.event.type === 'bet_expired');
  assertEqual(expired.length, 3, 'Each sweep announced once');

  await assertRejects(ledger.claim(ALICE, 1n), 'AlreadySettled', 'Swept bet cannot be claimed');
}

async function testNeverSweepsClaimable(): Promise<void> {
  section('Sweep: claimable bets are never swept');

  const { ledger, chain, sweeper } = await engineWithStaggeredBets();
  chain.advance(252n);
  assertEqual(chain.head, 258n, 'Head at 258');

  const readable = await ledger.computeResult(1n);
  assertEqual(readable.payout, 20n, 'Oldest bet is still claimable');
  assertEqual(await sweeper.sweepExpired(10), 0, 'Sweep leaves it alone');

  chain.advance();
  await assertRejects(ledger.computeResult(1n), 'ResultExpired', 'Window closes at 259');
  assertEqual(await sweeper.sweepExpired(10), 0, 'Still inside the horizon, not yet swept');
  assertEqual(ledger.pendingCount(), 5, 'All five bets pending');
}

async function testSettledBetsSkipped(): Promise<void> {
  section('Sweep: settled bets are not revisited');

  const { ledger, chain, sweeper, pool } = await engineWithStaggeredBets();
  chain.advance();
  const claimed = await ledger.claim(ALICE, 1n);
  chain.advance(297n);

  const poolBefore = pool.assets;
  const swept = await sweeper.sweepExpired(10);
  assertEqual(swept, 2, 'Bets 2 and 3 are past the horizon');
  assertEqual(ledger.getBet(1n).status, claimed.status, 'Claimed bet keeps its status');
  assertEqual(pool.assets, poolBefore + 20n, 'Only the swept stakes are credited');
}

async function testArguments(): Promise<void> {
  section('Sweep: arguments and construction');

  const engine = await createTestEngine();
  await assertRejects(engine.sweeper.sweepExpired(0), 'InvalidAmount', 'maxCount 0 rejected');
  await assertRejects(engine.sweeper.sweepExpired(1.5), 'InvalidAmount', 'Fractional maxCount rejected');

  let threw = false;
  try {
    new SweepScheduler({ lock: engine.lock, ledger: engine.ledger, randomness: engine.chain }, 256n);
  } catch {
    threw = true;
  }
  assert(threw, 'Horizon equal to the window is refused');
}

async function testBackgroundLoop(): Promise<void> {
  section('Sweep: background loop');

  const { ledger, chain, sweeper } = await engineWithStaggeredBets();
  chain.advance(400n);

  sweeper.start(5, 2);
  assert(sweeper.active, 'Loop is active after start');
  await sleep(100);
  sweeper.stop();

  assert(!sweeper.active, 'Loop is inactive after stop');
  assertEqual(ledger.pendingCount(), 0, 'Loop swept every expired bet in batches');
}

run('Expiry Sweep Tests', async () => {
  await testHorizon();
  await testSweepOnce();
  await testNeverSweepsClaimable();
  await testSettledBetsSkipped();
  await testArguments();
  await testBackgroundLoop();
});
