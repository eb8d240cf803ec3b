import { describe, it, expect } from 'vitest';
import { configToRecord, keyConfigFrom, loadConfig, parseConfig } from './index.js';
import { ConfigError } from '../errors.js';

describe('parseConfig', () => {
  it('should fill every default', () => {
    const config = parseConfig();

    expect(config.crypto.primeMin).toBe(50n);
    expect(config.crypto.primeMax).toBe(80n);
    expect(config.crypto.primeBits).toBeUndefined();
    expect(config.network).toEqual({ host: '127.0.0.1', port: 8888, statusPort: 8889 });
    expect(config.timeouts).toEqual({
      keyHolderMs: 30_000,
      keyDistributionMs: 30_000,
      responseMs: 30_000,
    });
    expect(config.limits).toEqual({ maxVoters: 9000, maxMessageBytes: 1_048_576 });
    expect(config.logLevel).toBe('info');
    expect(config.apiKey).toBeUndefined();
  });

  it('should keep a voter cap below the identifier namespace', () => {
    expect(parseConfig({ limits: { maxVoters: 20 } }).limits.maxVoters).toBe(20);
  });

  it('should reject an inverted prime range', () => {
    expect(() => parseConfig({ crypto: { primeMin: 80, primeMax: 50 } })).toThrow(
      'primeMax must be greater than primeMin'
    );
  });

  it('should reject a prime floor below 3', () => {
    expect(() => parseConfig({ crypto: { primeMin: 2, primeMax: 50 } })).toThrow(
      'primeMin must be at least 3'
    );
  });

  it('should reject privileged ports and non-positive timeouts', () => {
    expect(() => parseConfig({ network: { port: 80 } })).toThrow(ConfigError);
    expect(() => parseConfig({ network: { port: 80 } })).toThrow('network.port');
    expect(() => parseConfig({ timeouts: { responseMs: 0 } })).toThrow('timeouts.responseMs');
  });

  it('should round-trip through a plain record', () => {
    const config = parseConfig({ crypto: { primeBits: 64 }, apiKey: 'test-secret' });
    const record = configToRecord(config);

    expect(() => JSON.stringify(record)).not.toThrow();
    expect(parseConfig(record)).toEqual(config);
  });
});

describe('loadConfig', () => {
  it('should read VOTING_* variables', () => {
    const config = loadConfig({
      VOTING_PORT: '9000',
      VOTING_PRIME_MIN: '100',
      VOTING_PRIME_MAX: '200',
      VOTING_RESPONSE_TIMEOUT_MS: '500',
      VOTING_LOG_LEVEL: 'debug',
      VOTING_API_KEY: 'test-secret',
    });

    expect(config.network.port).toBe(9000);
    expect(config.network.statusPort).toBe(8889);
    expect(config.crypto.primeMin).toBe(100n);
    expect(config.crypto.primeMax).toBe(200n);
    expect(config.timeouts.responseMs).toBe(500);
    expect(config.timeouts.keyHolderMs).toBe(30_000);
    expect(config.logLevel).toBe('debug');
    expect(config.apiKey).toBe('test-secret');
  });

  it('should ignore empty variables', () => {
    expect(loadConfig({ VOTING_HOST: '' }).network.host).toBe('127.0.0.1');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ VOTING_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});

describe('keyConfigFrom', () => {
  it('should select the prime range by default', () => {
    expect(keyConfigFrom(parseConfig())).toEqual({ primeMin: 50n, primeMax: 80n });
  });

  it('should select bit-length generation when primeBits is set', () => {
    expect(keyConfigFrom(parseConfig({ crypto: { primeBits: 64 } }))).toEqual({ primeBits: 64 });
  });
});
