/**
 * DICEPOOL - Runtime
 *
 * Builds the engine, API and background timers from config. Without
 * RPC_URL the engine runs against a simulated chain that produces a block
 * every BLOCK_TIME_MS, with in-memory balances.
 */

import { createApiRouter } from './api';
import { createEngine, limitsFromConfig, type Engine } from './engine';
import { SimulatedChain } from './chain/simulated';
import { createRpcBlockSource } from './chain/rpc-source';
import { createTokenClient } from './chain/token-client';
import type { RandomnessSource } from './chain/randomness';
import type { AppConfig } from './config';

export interface Runtime {
  config: AppConfig;
  engine: Engine;
  app: ReturnType<typeof createApiRouter>;
  /** Set when running without an RPC node. */
  chain: SimulatedChain | null;
  start(): void;
  stop(): void;
}

export function buildRuntime(config: AppConfig): Runtime {
  let chain: SimulatedChain | null = null;
  let randomness: RandomnessSource;

  if (config.RPC_URL) {
    randomness = createRpcBlockSource({ rpcUrl: config.RPC_URL, window: config.RANDOMNESS_WINDOW });
    console.log(`[runtime] Reading block hashes from ${config.RPC_URL}`);
  } else {
    chain = new SimulatedChain({ seed: config.CHAIN_SEED, window: config.RANDOMNESS_WINDOW });
    randomness = chain;
    console.log(`[runtime] Simulated chain, one block every ${config.BLOCK_TIME_MS}ms`);
  }

  const engine = createEngine({
    randomness,
    token: createTokenClient(config),
    limits: limitsFromConfig(config),
    houseEdge: config.HOUSE_EDGE,
    expiryHorizon: config.EXPIRY_HORIZON,
  });

  const app = createApiRouter(engine, { faucetAmount: config.FAUCET_AMOUNT });

  let blockTimer: ReturnType<typeof setInterval> | null = null;

  return {
    config,
    engine,
    app,
    chain,
    start() {
      if (chain && !blockTimer) {
        const simulated = chain;
        blockTimer = setInterval(() => simulated.advance(), config.BLOCK_TIME_MS);
      }
      if (config.SWEEP_INTERVAL_MS > 0) {
        engine.sweeper.start(config.SWEEP_INTERVAL_MS, config.SWEEP_BATCH_SIZE);
      }
    },
    stop() {
      if (blockTimer) {
        clearInterval(blockTimer);
        blockTimer = null;
      }
      engine.sweeper.stop();
    },
  };
}
