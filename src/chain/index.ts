/**
 * DICEPOOL - Chain Module
 *
 * Block-hash randomness (simulated or over RPC) and collateral transfers.
 */

export { DEFAULT_RANDOMNESS_WINDOW, classifyPosition } from './randomness';
export type { RandomnessSource, RandomnessReading, RandomnessState } from './randomness';

export { SimulatedChain } from './simulated';
export type { SimulatedChainOptions } from './simulated';

export { RpcBlockSource, createRpcBlockSource } from './rpc-source';
export type { BlockReader, RpcSourceConfig } from './rpc-source';

export {
  MemoryTokenClient,
  Erc20TokenClient,
  createTokenClient,
  DEFAULT_CUSTODY,
} from './token-client';
export type { TokenClient, TransferEvent, TransferHook, Erc20TokenConfig } from './token-client';
