/**
 * Configuration Schema
 *
 * Tunable constants consumed by the server, the client and the status API.
 */

import { z } from 'zod';
import { VOTER_ID_CAPACITY } from '../session/registry.js';

const BigIntLike = z
  .union([z.bigint(), z.number().int(), z.string().regex(/^\d+$/, 'expected an integer')])
  .transform((value) => BigInt(value));

const Port = z.coerce.number().int().min(1024).max(65535);

const Milliseconds = z.coerce.number().int().positive();

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const CryptoConfigSchema = z
  .object({
    /** Lower bound of the demonstration prime range */
    primeMin: BigIntLike.default(50n),
    /** Upper bound of the demonstration prime range */
    primeMax: BigIntLike.default(80n),
    /** When set, primes of this many bits are drawn instead */
    primeBits: z.coerce.number().int().min(4).max(4096).optional(),
  })
  .refine((c) => c.primeMin >= 3n, { message: 'primeMin must be at least 3', path: ['primeMin'] })
  .refine((c) => c.primeMax > c.primeMin, {
    message: 'primeMax must be greater than primeMin',
    path: ['primeMax'],
  });

export const VotingConfigSchema = z.object({
  crypto: CryptoConfigSchema.default({}),

  network: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: Port.default(8888),
      statusPort: Port.default(8889),
    })
    .default({}),

  timeouts: z
    .object({
      /** Wait for the key holder's public key */
      keyHolderMs: Milliseconds.default(30_000),
      /** Wait for a voter to be handed the shared key */
      keyDistributionMs: Milliseconds.default(30_000),
      /** Wait for a proof response */
      responseMs: Milliseconds.default(30_000),
    })
    .default({}),

  limits: z
    .object({
      maxVoters: z.coerce
        .number()
        .int()
        .positive()
        .default(10_000)
        .transform((value) => Math.min(value, VOTER_ID_CAPACITY)),
      maxMessageBytes: z.coerce.number().int().positive().default(1024 * 1024),
    })
    .default({}),

  logLevel: z.enum(LOG_LEVELS).default('info'),

  /** Required by the status API's write endpoints */
  apiKey: z.string().min(1).optional(),
});

export type VotingConfig = z.output<typeof VotingConfigSchema>;

export type VotingConfigInput = z.input<typeof VotingConfigSchema>;

export type LogLevel = (typeof LOG_LEVELS)[number];
