/**
 * DICEPOOL - Simulated Chain
 *
 * In-process block clock used for local runs, the simulation script and
 * tests. Each finalized block gets a deterministic hash derived from the
 * chain seed; hashes older than the window are dropped, as on a real chain.
 */

import { encodePacked, keccak256, toHex, type Hex } from 'viem';
import {
  DEFAULT_RANDOMNESS_WINDOW,
  classifyPosition,
  type RandomnessReading,
  type RandomnessSource,
} from './randomness';

export interface SimulatedChainOptions {
  /** Any label; hashed into the bytes32 chain seed. */
  seed?: string;
  window?: bigint;
  /** Position of the first (not yet finalized) block. */
  startPosition?: bigint;
}

export class SimulatedChain implements RandomnessSource {
  readonly window: bigint;
  private readonly seed: Hex;
  private position: bigint;
  private readonly hashes = new Map<bigint, Hex>();

  constructor(options: SimulatedChainOptions = {}) {
    this.window = options.window ?? DEFAULT_RANDOMNESS_WINDOW;
    this.seed = keccak256(toHex(options.seed ?? 'dicepool'));
    this.position = options.startPosition ?? 1n;
  }

  /** Current position, synchronously. */
  get head(): bigint {
    return this.position;
  }

  async currentPosition(): Promise<bigint> {
    return this.position;
  }

  /** Finalize `blocks` blocks and return the new current position. */
  advance(blocks: bigint = 1n): bigint {
    for (let i = 0n; i < blocks; i++) {
      this.hashes.set(this.position, this.hashOf(this.position));
      this.position += 1n;
    }
    for (const finalized of this.hashes.keys()) {
      if (this.position - finalized > this.window) this.hashes.delete(finalized);
    }
    return this.position;
  }

  async readAfter(origin: bigint): Promise<RandomnessReading> {
    const target = origin + 1n;
    const state = classifyPosition(target, this.position, this.window);
    if (state !== 'available') return { state };

    const hash = this.hashes.get(target);
    // Positions before startPosition were never produced by this chain.
    if (!hash) return { state: 'expired' };
    return { state: 'available', hash };
  }

  private hashOf(position: bigint): Hex {
    return keccak256(encodePacked(['bytes32', 'uint256'], [this.seed, position]));
  }
}
