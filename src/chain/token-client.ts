/**
 * DICEPOOL - Token Client
 *
 * Abstraction layer for collateral movement. The engine only ever pulls a
 * stake from a caller or pushes a payout to one; each call either moves the
 * full amount or throws. MemoryTokenClient keeps balances in process (local
 * runs, tests); Erc20TokenClient moves a real ERC-20 through viem.
 */

import {
  createPublicClient,
  createWalletClient,
  defineChain,
  getAddress,
  http,
  isAddress,
  isHex,
  type Address,
  type Hex,
} from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { EngineError } from '../betting/errors';

// ─── ERC-20 ABI (minimal) ──────────────────────────────────────────

const erc20Abi = [
  {
    type: 'function',
    name: 'transfer',
    inputs: [
      { name: 'to', type: 'address' },
      { name: 'amount', type: 'uint256' },
    ],
    outputs: [{ name: '', type: 'bool' }],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'transferFrom',
    inputs: [
      { name: 'from', type: 'address' },
      { name: 'to', type: 'address' },
      { name: 'amount', type: 'uint256' },
    ],
    outputs: [{ name: '', type: 'bool' }],
    stateMutability: 'nonpayable',
  },
  {
    type: 'function',
    name: 'balanceOf',
    inputs: [{ name: 'account', type: 'address' }],
    outputs: [{ name: '', type: 'uint256' }],
    stateMutability: 'view',
  },
] as const;

// ─── TokenClient Interface ─────────────────────────────────────────

export interface TokenClient {
  /** Address that holds escrowed stakes and pool collateral. */
  readonly custody: Address;

  /** Move `amount` from `from` into custody. */
  pull(from: Address, amount: bigint): Promise<void>;

  /** Move `amount` from custody to `to`. */
  push(to: Address, amount: bigint): Promise<void>;

  getBalance(address: Address): Promise<bigint>;
}

// ─── MemoryTokenClient ─────────────────────────────────────────────

export interface TransferEvent {
  from: Address;
  to: Address;
  amount: bigint;
}

/** Invoked after every transfer, before the transfer call returns. Throwing reverts it. */
export type TransferHook = (event: TransferEvent) => void | Promise<void>;

export const DEFAULT_CUSTODY: Address = '0x000000000000000000000000000000000000d1ce';

export class MemoryTokenClient implements TokenClient {
  readonly custody: Address;
  private readonly balances = new Map<Address, bigint>();
  private readonly hooks: TransferHook[] = [];

  constructor(custody: Address = DEFAULT_CUSTODY) {
    this.custody = getAddress(custody);
  }

  /** Credit `to` out of thin air (faucet, test setup). */
  mint(to: Address, amount: bigint): void {
    const key = getAddress(to);
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  onTransfer(hook: TransferHook): () => void {
    this.hooks.push(hook);
    return () => {
      const i = this.hooks.indexOf(hook);
      if (i >= 0) this.hooks.splice(i, 1);
    };
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new EngineError('InvalidAmount', `Transfer amount must be positive, got ${amount}`);
    }
    const source = getAddress(from);
    const destination = getAddress(to);
    const available = this.balanceOf(source);
    if (available < amount) {
      throw new EngineError(
        'InsufficientBalance',
        `${source} holds ${available}, needs ${amount}`,
      );
    }

    this.balances.set(source, available - amount);
    this.balances.set(destination, this.balanceOf(destination) + amount);

    try {
      for (const hook of [...this.hooks]) {
        await hook({ from: source, to: destination, amount });
      }
    } catch (err) {
      // A failing receiver hook reverts the whole transfer.
      this.balances.set(destination, this.balanceOf(destination) - amount);
      this.balances.set(source, this.balanceOf(source) + amount);
      throw err;
    }
  }

  async pull(from: Address, amount: bigint): Promise<void> {
    await this.transfer(from, this.custody, amount);
  }

  async push(to: Address, amount: bigint): Promise<void> {
    await this.transfer(this.custody, to, amount);
  }

  async getBalance(address: Address): Promise<bigint> {
    return this.balanceOf(getAddress(address));
  }

  private balanceOf(address: Address): bigint {
    return this.balances.get(address) ?? 0n;
  }
}

// ─── Erc20TokenClient ──────────────────────────────────────────────

export interface Erc20TokenConfig {
  rpcUrl: string;
  chainId: number;
  /** Custody key; stakers approve this account for transferFrom. */
  privateKey: Hex;
  tokenAddress: Address;
}

function buildClients(config: Erc20TokenConfig) {
  const account = privateKeyToAccount(config.privateKey);

  const chain = defineChain({
    id: config.chainId,
    name: `chain-${config.chainId}`,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: {
      default: {
        http: [config.rpcUrl],
      },
    },
  });

  return {
    account,
    publicClient: createPublicClient({ chain, transport: http(config.rpcUrl) }),
    walletClient: createWalletClient({ chain, account, transport: http(config.rpcUrl) }),
  };
}

export class Erc20TokenClient implements TokenClient {
  readonly custody: Address;
  private readonly clients: ReturnType<typeof buildClients>;
  private readonly tokenAddress: Address;

  constructor(config: Erc20TokenConfig) {
    this.clients = buildClients(config);
    this.custody = this.clients.account.address;
    this.tokenAddress = config.tokenAddress;
  }

  async pull(from: Address, amount: bigint): Promise<void> {
    const hash = await this.clients.walletClient.writeContract({
      address: this.tokenAddress,
      abi: erc20Abi,
      functionName: 'transferFrom',
      args: [from, this.custody, amount],
    });
    await this.confirm(hash, `pull ${amount} from ${from}`);
  }

  async push(to: Address, amount: bigint): Promise<void> {
    const hash = await this.clients.walletClient.writeContract({
      address: this.tokenAddress,
      abi: erc20Abi,
      functionName: 'transfer',
      args: [to, amount],
    });
    await this.confirm(hash, `push ${amount} to ${to}`);
  }

  async getBalance(address: Address): Promise<bigint> {
    return this.clients.publicClient.readContract({
      address: this.tokenAddress,
      abi: erc20Abi,
      functionName: 'balanceOf',
      args: [address],
    });
  }

  private async confirm(hash: Hex, what: string): Promise<void> {
    const receipt = await this.clients.publicClient.waitForTransactionReceipt({ hash });
    if (receipt.status !== 'success') {
      throw new EngineError('TransferFailed', `Token ${what} reverted (tx ${hash})`);
    }
    console.log(`[token] ${what} confirmed in tx ${hash}`);
  }
}

// ─── Factory ───────────────────────────────────────────────────────

export function createTokenClient(env: {
  RPC_URL?: string;
  CHAIN_ID?: number;
  PRIVATE_KEY?: string;
  TOKEN_ADDRESS?: string;
}): TokenClient {
  const { RPC_URL, PRIVATE_KEY, TOKEN_ADDRESS } = env;

  if (!RPC_URL || !PRIVATE_KEY || !TOKEN_ADDRESS) {
    const missing = [
      !RPC_URL && 'RPC_URL',
      !PRIVATE_KEY && 'PRIVATE_KEY',
      !TOKEN_ADDRESS && 'TOKEN_ADDRESS',
    ].filter(Boolean);
    console.warn(
      `[token] Using in-memory balances -- missing env vars: ${missing.join(', ')}`,
    );
    return new MemoryTokenClient();
  }

  if (!isHex(PRIVATE_KEY) || !isAddress(TOKEN_ADDRESS)) {
    throw new Error('[token] PRIVATE_KEY must be hex and TOKEN_ADDRESS an address');
  }

  return new Erc20TokenClient({
    rpcUrl: RPC_URL,
    chainId: env.CHAIN_ID ?? 31337,
    privateKey: PRIVATE_KEY,
    tokenAddress: TOKEN_ADDRESS,
  });
}
