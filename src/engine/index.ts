/**
 * DICEPOOL - Engine
 *
 * Wires the ledger, pool and sweeper around one lock and one event bus.
 * Randomness and token movement are supplied by the caller.
 */

import { BetLedger, type LedgerLimits } from '../betting/ledger';
import { SweepScheduler, DEFAULT_EXPIRY_HORIZON } from '../betting/sweep';
import { LiquidityPool } from '../vault/pool';
import { EngineLock } from './lock';
import { EventBus } from './events';
import type { RandomnessSource } from '../chain/randomness';
import type { TokenClient } from '../chain/token-client';
import type { AppConfig } from '../config';

export { EngineLock } from './lock';
export { EventBus } from './events';
export type {
  EngineEvent,
  RecordedEvent,
  EventListener,
  ListenerRunner,
  BetPlacedEvent,
  BetResolvedEvent,
  BetClaimedEvent,
  BetExpiredEvent,
  HouseEdgeChangedEvent,
  StakedEvent,
  UnstakedEvent,
} from './events';

export interface EngineOptions {
  randomness: RandomnessSource;
  token: TokenClient;
  limits: LedgerLimits;
  houseEdge: bigint;
  expiryHorizon?: bigint;
  eventHistory?: number;
}

export interface Engine {
  lock: EngineLock;
  events: EventBus;
  randomness: RandomnessSource;
  token: TokenClient;
  pool: LiquidityPool;
  ledger: BetLedger;
  sweeper: SweepScheduler;
}

export function createEngine(options: EngineOptions): Engine {
  const lock = new EngineLock();
  const events = new EventBus(options.eventHistory, (deliver) => lock.outside(deliver));
  const { randomness, token } = options;

  const pool = new LiquidityPool({ lock, token, events });
  const ledger = new BetLedger(
    { lock, pool, randomness, token, events },
    options.limits,
    options.houseEdge,
  );
  const sweeper = new SweepScheduler(
    { lock, ledger, randomness },
    options.expiryHorizon ?? DEFAULT_EXPIRY_HORIZON,
  );

  return { lock, events, randomness, token, pool, ledger, sweeper };
}

/** Ledger limits as configured. */
export function limitsFromConfig(config: AppConfig): LedgerLimits {
  return {
    minBet: config.MIN_BET,
    minOdds: config.MIN_ODDS,
    maxOdds: config.MAX_ODDS,
    maxHouseEdge: config.MAX_HOUSE_EDGE,
    operator: config.OPERATOR_ADDRESS ?? null,
  };
}
