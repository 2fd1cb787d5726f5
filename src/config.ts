/**
 * DICEPOOL - Configuration
 *
 * Everything tunable comes from environment variables, validated once at
 * startup. Fractions (edge, odds) are written as decimals ("0.01" = 1%);
 * amounts are integers in the collateral's base unit.
 */

import { z } from 'zod';
import { getAddress, isAddress, type Address } from 'viem';
import { SCALE, parseScaled } from './betting/math';

// ─── Field Schemas ───────────────────────────────────────────────

const FractionSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d{1,18})?$/, 'must be a decimal such as 0.01')
  .transform((v) => parseScaled(v));

const UintSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((v) => BigInt(v));

const AddressSchema = z
  .string()
  .trim()
  .refine((v) => isAddress(v), 'must be a 0x-prefixed address')
  .transform((v): Address => getAddress(v));

/** Optional field where a blank value (`KEY=` in .env) means unset. */
function unsetIfBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === '' ? undefined : v), schema.optional());
}

// ─── Config Schema ───────────────────────────────────────────────

export const ConfigSchema = z
  .object({
    HOUSE_EDGE: FractionSchema.default('0.01'),
    /** Ceiling for the admin house-edge setter. */
    MAX_HOUSE_EDGE: FractionSchema.default('0.1'),
    MIN_BET: UintSchema.default('1'),
    MIN_ODDS: FractionSchema.default('0.01'),
    MAX_ODDS: FractionSchema.default('0.95'),
    RANDOMNESS_WINDOW: UintSchema.default('256'),
    EXPIRY_HORIZON: UintSchema.default('300'),
    OPERATOR_ADDRESS: unsetIfBlank(AddressSchema),

    PORT: z.coerce.number().int().positive().default(8787),
    /** 0 disables the background sweep. */
    SWEEP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60_000),
    SWEEP_BATCH_SIZE: z.coerce.number().int().positive().default(25),

    /** Simulated chain (used when RPC_URL is unset). */
    CHAIN_SEED: z.string().default('dicepool'),
    BLOCK_TIME_MS: z.coerce.number().int().positive().default(2_000),
    /** Amount POST /faucet mints with in-memory balances; 0 disables it. */
    FAUCET_AMOUNT: UintSchema.default('1000000000000000000000'),

    RPC_URL: unsetIfBlank(z.string().url()),
    CHAIN_ID: z.coerce.number().int().positive().default(31337),
    PRIVATE_KEY: unsetIfBlank(z.string()),
    TOKEN_ADDRESS: unsetIfBlank(z.string()),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.MAX_HOUSE_EDGE >= SCALE) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['MAX_HOUSE_EDGE'], message: 'must be below 1' });
    }
    if (cfg.HOUSE_EDGE === 0n || cfg.HOUSE_EDGE > cfg.MAX_HOUSE_EDGE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HOUSE_EDGE'],
        message: 'must be above 0 and at most MAX_HOUSE_EDGE',
      });
    }
    if (cfg.MIN_ODDS === 0n || cfg.MAX_ODDS >= SCALE || cfg.MIN_ODDS > cfg.MAX_ODDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_ODDS'],
        message: 'odds band must satisfy 0 < MIN_ODDS <= MAX_ODDS < 1',
      });
    }
    if (cfg.EXPIRY_HORIZON <= cfg.RANDOMNESS_WINDOW) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EXPIRY_HORIZON'],
        message: 'must exceed RANDOMNESS_WINDOW so a claimable bet is never swept',
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

/** Parse config from an env record; throws with every problem listed. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`[config] Invalid configuration:\n${problems}`);
  }
  return parsed.data;
}
