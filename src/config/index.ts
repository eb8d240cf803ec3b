/**
 * Configuration
 *
 * @module config
 */

import { ConfigError } from '../errors.js';
import type { PaillierKeyConfig } from '../paillier/types.js';
import { VotingConfigSchema, type VotingConfig, type VotingConfigInput } from './types.js';

/**
 * Validate a partial configuration, filling defaults
 *
 * @throws {ConfigError} Listing every invalid field
 */
export function parseConfig(input: unknown = {}): VotingConfig {
  const parsed = VotingConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

const ENV_KEYS = {
  VOTING_HOST: ['network', 'host'],
  VOTING_PORT: ['network', 'port'],
  VOTING_STATUS_PORT: ['network', 'statusPort'],
  VOTING_PRIME_MIN: ['crypto', 'primeMin'],
  VOTING_PRIME_MAX: ['crypto', 'primeMax'],
  VOTING_PRIME_BITS: ['crypto', 'primeBits'],
  VOTING_KEY_HOLDER_TIMEOUT_MS: ['timeouts', 'keyHolderMs'],
  VOTING_KEY_DISTRIBUTION_TIMEOUT_MS: ['timeouts', 'keyDistributionMs'],
  VOTING_RESPONSE_TIMEOUT_MS: ['timeouts', 'responseMs'],
  VOTING_MAX_VOTERS: ['limits', 'maxVoters'],
  VOTING_MAX_MESSAGE_BYTES: ['limits', 'maxMessageBytes'],
} as const satisfies Record<string, readonly [string, string]>;

/**
 * Build the configuration from `VOTING_*` environment variables
 *
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VotingConfig {
  const sections: Record<string, Record<string, string>> = {};

  for (const [variable, [section, field]] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    sections[section] = { ...sections[section], [field]: value };
  }

  const input: Record<string, unknown> = { ...sections };
  if (env.VOTING_LOG_LEVEL) input.logLevel = env.VOTING_LOG_LEVEL;
  if (env.VOTING_API_KEY) input.apiKey = env.VOTING_API_KEY;

  return parseConfig(input);
}

/**
 * Plain JSON-safe record; `parseConfig(configToRecord(c))` reproduces `c`
 */
export function configToRecord(config: VotingConfig): VotingConfigInput {
  const { primeMin, primeMax, primeBits } = config.crypto;

  return {
    crypto: {
      primeMin: primeMin.toString(),
      primeMax: primeMax.toString(),
      ...(primeBits !== undefined ? { primeBits } : {}),
    },
    network: { ...config.network },
    timeouts: { ...config.timeouts },
    limits: { ...config.limits },
    logLevel: config.logLevel,
    ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
  };
}

/**
 * Key generation parameters selected by the configuration
 */
export function keyConfigFrom(config: VotingConfig): PaillierKeyConfig {
  const { primeMin, primeMax, primeBits } = config.crypto;
  return primeBits !== undefined ? { primeBits } : { primeMin, primeMax };
}

export { VotingConfigSchema, LOG_LEVELS } from './types.js';
export type { VotingConfig, VotingConfigInput, LogLevel } from './types.js';
