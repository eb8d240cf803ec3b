/**
 * paillier-ballot
 * Homomorphic YES/NO voting with verifiable ballots
 *
 * "Count every vote. Read none of them."
 *
 * Voters encrypt +1 or -1 under one key holder's Paillier key. The server
 * multiplies the ciphertexts into an encrypted sum that only the key holder
 * can open, then challenges every voter to prove, in zero knowledge, that
 * the ballot they submitted is the one they committed to.
 */

// =============================================================================
// Cryptographic Primitives
// =============================================================================

// Paillier encryption
export {
  Paillier,
  DEFAULT_KEY_CONFIG,
  keyPairFromPrimes,
  generateKeyPair,
  encrypt,
  encryptWithRandomness,
  decrypt,
  addCiphertexts,
  isPlaintextInRange,
  isValidCiphertext,
  classifyTally,
} from './paillier/index.js';

export type {
  PaillierKeyConfig,
  PrimeRangeConfig,
  PrimeBitsConfig,
  PaillierPublicKey,
  PaillierPrivateKey,
  PaillierKeyPair,
  EncryptionResult,
  TallyOutcome,
} from './paillier/index.js';

// Sigma proof of ballot knowledge
export {
  SigmaProof,
  commit,
  commitWith,
  challenge,
  respond,
  verify,
} from './sigma/index.js';

export type {
  SigmaCommitment,
  CommitmentSecret,
  CommitmentPair,
  ProofWitness,
  SigmaChallenge,
  SigmaResponse,
} from './sigma/index.js';

// =============================================================================
// Protocol
// =============================================================================

export * from './protocol/index.js';

// =============================================================================
// Session, Server & Client
// =============================================================================

export * from './session/index.js';
export * from './server/index.js';
export * from './client/index.js';

// =============================================================================
// Simulation, Status API & Configuration
// =============================================================================

export { runVotingSimulation, KIOSK_ID } from './simulation/index.js';
export type { SimulatedVote, SimulationOptions, SimulationResult } from './simulation/index.js';

export { createStatusServer, startStatusServer } from './api/server.js';
export type { StatusServerConfig } from './api/server.js';

export {
  parseConfig,
  loadConfig,
  configToRecord,
  keyConfigFrom,
  VotingConfigSchema,
  LOG_LEVELS,
} from './config/index.js';
export type { VotingConfig, VotingConfigInput, LogLevel } from './config/index.js';

export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// =============================================================================
// Errors & Utilities
// =============================================================================

export {
  VotingError,
  KeyGenerationError,
  EncryptionError,
  DecryptionError,
  ProtocolViolation,
  ProtocolTimeout,
  SessionError,
  ConfigError,
} from './errors.js';

export {
  modPow,
  modInverse,
  extendedGcd,
  mod,
  gcd,
  isPrime,
  isProbablePrime,
  generatePrime,
  generatePrimeInRange,
  randomBigInt,
  randomCoprime,
} from './utils/mod-arithmetic.js';
