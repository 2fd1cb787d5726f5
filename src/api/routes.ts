/**
 * DICEPOOL - API Routes
 *
 * REST surface over the engine: betting, claims, sweeping, the liquidity
 * pool and house-edge administration. Uses Hono with CORS middleware.
 *
 * Conventions:
 *   - amounts, odds and ids travel as decimal strings (1e18-scaled odds)
 *   - the caller's account is the `x-account` header
 *   - failures are `{ error: <code>, message }`
 */

import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';
import { getAddress, isAddress, type Address } from 'viem';
import type { Engine } from '../engine';
import { EngineError, type EngineErrorCode } from '../betting/errors';
import { DEFAULT_SWEEP_BATCH } from '../betting/sweep';
import { MemoryTokenClient } from '../chain/token-client';
import { serialize } from './serialize';

export const API_VERSION = 'v1';

// ─── Error Mapping ──────────────────────────────────────────────

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500 | 502;

export const ERROR_STATUS: Record<EngineErrorCode, ErrorStatus> = {
  InvalidAmount: 400,
  InvalidOdds: 400,
  InvalidHouseEdge: 400,
  DivisionByZeroOdds: 400,
  ArithmeticOverflow: 400,
  Unauthorized: 403,
  BetNotFound: 404,
  TooEarly: 409,
  ResultExpired: 409,
  AlreadySettled: 409,
  Reentrancy: 409,
  ExceedsRiskLimit: 422,
  InsufficientLiquidity: 422,
  InsufficientShares: 422,
  InsufficientBalance: 422,
  TransferFailed: 502,
};

// ─── Request Schemas ────────────────────────────────────────────

const UintSchema = z
  .union([z.string().regex(/^\d+$/, 'must be a non-negative integer string'), z.number().int().nonnegative().safe()])
  .transform((v) => BigInt(v));

const PlaceBetBody = z.object({
  amount: UintSchema,
  targetOdds: UintSchema,
});

const SweepBody = z.object({
  maxCount: z.number().int().positive().max(1000).default(DEFAULT_SWEEP_BATCH),
});

const StakeBody = z.object({ assets: UintSchema });
const UnstakeBody = z.object({ shares: UintSchema });
const HouseEdgeBody = z.object({ edge: UintSchema });

async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const body: unknown = await c.req.json().catch(() => ({}));
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new HTTPException(400, { message });
  }
  return parsed.data;
}

function parseUint(raw: string | undefined, label: string): bigint {
  if (!raw || !/^\d+$/.test(raw)) {
    throw new HTTPException(400, { message: `${label} must be a non-negative integer` });
  }
  return BigInt(raw);
}

function parseAddress(raw: string | undefined, label: string): Address {
  if (!raw || !isAddress(raw)) {
    throw new HTTPException(400, { message: `${label} must be an address` });
  }
  return getAddress(raw);
}

/** Account making the request, from the `x-account` header. */
function callerOf(c: Context): Address {
  const header = c.req.header('x-account');
  if (!header || !isAddress(header)) {
    throw new HTTPException(401, { message: 'x-account header with a valid address is required' });
  }
  return getAddress(header);
}

// ─── Router ─────────────────────────────────────────────────────

export interface ApiOptions {
  /** Amount POST /faucet mints; 0 disables the faucet. */
  faucetAmount?: bigint;
}

export function createApiRouter(engine: Engine, options: ApiOptions = {}) {
  const { ledger, pool, sweeper, events, randomness } = engine;
  const faucetAmount = options.faucetAmount ?? 0n;

  const app = new Hono();

  // CORS for dashboards and indexers
  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'x-account'],
    }),
  );

  app.onError((err, c) => {
    if (err instanceof EngineError) {
      return c.json({ error: err.code, message: err.message }, ERROR_STATUS[err.code]);
    }
    if (err instanceof HTTPException) {
      const error = err.status === 401 ? 'Unauthorized' : 'InvalidRequest';
      return c.json({ error, message: err.message }, err.status);
    }
    console.error('[api] Unhandled error:', err);
    return c.json({ error: 'Internal', message: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  // ── Health / Root ─────────────────────────────────────────────

  app.get('/health', (c) =>
    c.json({
      status: 'alive',
      service: 'dicepool',
      timestamp: new Date().toISOString(),
    }),
  );

  app.get('/', (c) =>
    c.json({
      name: 'DICEPOOL',
      version: '0.1.0',
      api: API_VERSION,
      endpoints: {
        health: 'GET /health',
        config: 'GET /config',
        maxBet: 'GET /max-bet?odds=',
        placeBet: 'POST /bet',
        bet: 'GET /bet/:id',
        betResult: 'GET /bet/:id/result',
        claim: 'POST /bet/:id/claim',
        userBets: 'GET /user/:address/bets',
        sweep: 'POST /sweep',
        pool: 'GET /pool',
        poolPosition: 'GET /pool/:address',
        stake: 'POST /pool/stake',
        unstake: 'POST /pool/unstake',
        houseEdge: 'GET /house-edge',
        setHouseEdge: 'PUT /admin/house-edge',
        events: 'GET /events?after=',
        faucet: 'POST /faucet',
      },
    }),
  );

  app.get('/config', async (c) => {
    const { minBet, minOdds, maxOdds, maxHouseEdge, operator } = ledger.limits;
    return c.json(
      serialize({
        houseEdge: ledger.houseEdge(),
        maxHouseEdge,
        minBet,
        minOdds,
        maxOdds,
        operator,
        randomnessWindow: randomness.window,
        expiryHorizon: sweeper.expiryHorizon,
        currentBlock: await randomness.currentPosition(),
      }),
    );
  });

  // ── Betting ───────────────────────────────────────────────────

  app.get('/max-bet', (c) => {
    const odds = parseUint(c.req.query('odds'), 'odds');
    return c.json(serialize({ targetOdds: odds, maxBet: ledger.getMaxBet(odds) }));
  });

  app.post('/bet', async (c) => {
    const owner = callerOf(c);
    const { amount, targetOdds } = await readBody(c, PlaceBetBody);
    const betId = await ledger.placeBet(owner, amount, targetOdds);
    return c.json(serialize({ ok: true, bet: ledger.getBet(betId) }), 201);
  });

  app.get('/bet/:id', (c) => {
    const betId = parseUint(c.req.param('id'), 'bet id');
    return c.json(serialize(ledger.getBet(betId)));
  });

  app.get('/bet/:id/result', async (c) => {
    const betId = parseUint(c.req.param('id'), 'bet id');
    const result = await ledger.computeResult(betId);
    return c.json(serialize({ betId, ...result }));
  });

  app.post('/bet/:id/claim', async (c) => {
    const caller = callerOf(c);
    const betId = parseUint(c.req.param('id'), 'bet id');
    const result = await ledger.claim(caller, betId);
    return c.json(serialize({ ok: true, ...result }));
  });

  app.get('/user/:address/bets', (c) => {
    const owner = parseAddress(c.req.param('address'), 'address');
    return c.json(serialize({ owner, bets: ledger.betsOf(owner) }));
  });

  app.post('/sweep', async (c) => {
    const { maxCount } = await readBody(c, SweepBody);
    const swept = await sweeper.sweepExpired(maxCount);
    return c.json({ ok: true, swept, pending: ledger.pendingCount() });
  });

  // ── Pool ──────────────────────────────────────────────────────

  app.get('/pool', (c) =>
    c.json(
      serialize({
        ...pool.snapshot(),
        escrowed: ledger.escrowed(),
        pendingBets: ledger.pendingCount(),
        nextBetId: ledger.nextBetId(),
      }),
    ),
  );

  app.get('/pool/:address', (c) => {
    const account = parseAddress(c.req.param('address'), 'address');
    return c.json(serialize(pool.position(account)));
  });

  app.post('/pool/stake', async (c) => {
    const account = callerOf(c);
    const { assets } = await readBody(c, StakeBody);
    const shares = await pool.stake(account, assets);
    return c.json(serialize({ ok: true, assets, shares, pool: pool.snapshot() }), 201);
  });

  app.post('/pool/unstake', async (c) => {
    const account = callerOf(c);
    const { shares } = await readBody(c, UnstakeBody);
    const assets = await pool.unstake(account, shares);
    return c.json(serialize({ ok: true, assets, shares, pool: pool.snapshot() }));
  });

  // ── House edge ────────────────────────────────────────────────

  app.get('/house-edge', (c) => c.json(serialize({ houseEdge: ledger.houseEdge() })));

  app.put('/admin/house-edge', async (c) => {
    const caller = callerOf(c);
    const { edge } = await readBody(c, HouseEdgeBody);
    await ledger.setHouseEdge(caller, edge);
    return c.json(serialize({ ok: true, houseEdge: ledger.houseEdge() }));
  });

  // ── Events ────────────────────────────────────────────────────

  app.get('/events', (c) => {
    const after = Number(parseUint(c.req.query('after') ?? '0', 'after'));
    return c.json(serialize({ lastSeq: events.lastSeq, events: events.since(after) }));
  });

  // ── Faucet (in-memory balances only) ──────────────────────────

  app.post('/faucet', async (c) => {
    const account = callerOf(c);
    const { token } = engine;
    if (faucetAmount === 0n || !(token instanceof MemoryTokenClient)) {
      return c.json({ error: 'Not found' }, 404);
    }
    token.mint(account, faucetAmount);
    return c.json(
      serialize({ ok: true, account, minted: faucetAmount, balance: await token.getBalance(account) }),
    );
  });

  return app;
}
