/**
 * Error taxonomy shared by every module.
 *
 * Fraud (a failed proof) is not an error: it is recorded per voter in the
 * verification report.
 */

export class VotingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VotingError';
  }
}

/** No valid key pair could be produced; fatal to that session */
export class KeyGenerationError extends VotingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'KEY_GENERATION_FAILED', details);
    this.name = 'KeyGenerationError';
  }
}

/** Plaintext outside (-n/2, n/2) */
export class EncryptionError extends VotingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PLAINTEXT_OUT_OF_RANGE', details);
    this.name = 'EncryptionError';
  }
}

/** Ciphertext not decodable under the given key */
export class DecryptionError extends VotingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DECRYPTION_FAILED', details);
    this.name = 'DecryptionError';
  }
}

/**
 * A message arrived out of phase or malformed. The offending connection is
 * dropped; the session carries on for everyone else.
 */
export class ProtocolViolation extends VotingError {
  constructor(message: string, code = 'PROTOCOL_VIOLATION', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ProtocolViolation';
  }
}

/** A bounded wait elapsed without data */
export class ProtocolTimeout extends ProtocolViolation {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT', details);
    this.name = 'ProtocolTimeout';
  }
}

/**
 * Session-level refusal: wrong phase, session ended or full, no usable
 * public key at tally time.
 */
export class SessionError extends VotingError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'SessionError';
  }
}

export class ConfigError extends VotingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIG', details);
    this.name = 'ConfigError';
  }
}
