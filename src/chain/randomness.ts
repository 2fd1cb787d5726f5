/**
 * DICEPOOL - Randomness Source
 *
 * A bet placed at ordering position `p` is resolved with the hash of
 * position `p + 1`, which nobody (the bettor included) can know when the
 * bet is accepted. Hashes are only queryable for a bounded window after
 * they are finalized, so a reading distinguishes "too early" from "too late".
 */

import type { Hex } from 'viem';

/** Block hashes stay queryable for this many positions (EVM BLOCKHASH). */
export const DEFAULT_RANDOMNESS_WINDOW = 256n;

export type RandomnessReading =
  | { state: 'pending' }
  | { state: 'available'; hash: Hex }
  | { state: 'expired' };

export type RandomnessState = RandomnessReading['state'];

export interface RandomnessSource {
  /** Number of positions a hash stays readable after it is finalized. */
  readonly window: bigint;

  /** Position an operation accepted now is ordered at. */
  currentPosition(): Promise<bigint>;

  /** Hash that resolves a bet placed at `origin`, i.e. the hash of `origin + 1`. */
  readAfter(origin: bigint): Promise<RandomnessReading>;
}

/**
 * Where `position` sits relative to `current`: not yet finalized, inside the
 * readable window, or rolled out of it.
 */
export function classifyPosition(
  position: bigint,
  current: bigint,
  window: bigint,
): RandomnessState {
  if (position >= current) return 'pending';
  if (current - position > window) return 'expired';
  return 'available';
}
