/**
 * DICEPOOL - RPC Block Source
 *
 * Reads block hashes from an EVM node through viem. The pending block
 * (latest + 1) is the current ordering position. Archive nodes serve hashes
 * forever, so the BLOCKHASH window is enforced here to keep results
 * identical to what an on-chain settlement could compute.
 */

import { createPublicClient, http, type Hex, type Transport } from 'viem';
import {
  DEFAULT_RANDOMNESS_WINDOW,
  classifyPosition,
  type RandomnessReading,
  type RandomnessSource,
} from './randomness';

/** The two reads the source needs from a node. */
export interface BlockReader {
  getBlockNumber(): Promise<bigint>;
  getBlockHash(blockNumber: bigint): Promise<Hex | null>;
}

export class RpcBlockSource implements RandomnessSource {
  constructor(
    private readonly reader: BlockReader,
    readonly window: bigint = DEFAULT_RANDOMNESS_WINDOW,
  ) {}

  async currentPosition(): Promise<bigint> {
    const latest = await this.reader.getBlockNumber();
    return latest + 1n;
  }

  async readAfter(origin: bigint): Promise<RandomnessReading> {
    const target = origin + 1n;
    const current = await this.currentPosition();
    const state = classifyPosition(target, current, this.window);
    if (state !== 'available') return { state };

    const hash = await this.reader.getBlockHash(target);
    if (!hash) return { state: 'pending' };
    return { state: 'available', hash };
  }
}

// ─── Factory ───────────────────────────────────────────────────────

export interface RpcSourceConfig {
  rpcUrl?: string;
  /** Overrides `rpcUrl`, e.g. a `custom()` transport. */
  transport?: Transport;
  window?: bigint;
}

export function createRpcBlockSource(config: RpcSourceConfig): RpcBlockSource {
  const client = createPublicClient({
    transport: config.transport ?? http(config.rpcUrl),
  });

  const reader: BlockReader = {
    // The block number must never come from viem's polling cache.
    getBlockNumber: () => client.getBlockNumber({ cacheTime: 0 }),
    getBlockHash: async (blockNumber) => {
      const block = await client.getBlock({ blockNumber });
      return block.hash;
    },
  };

  return new RpcBlockSource(reader, config.window);
}
