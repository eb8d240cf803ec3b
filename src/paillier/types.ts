/**
 * Paillier Type Definitions
 *
 * Simplified Paillier variant with g = n + 1 and λ = (p-1)(q-1).
 * Ciphertexts multiply to the encryption of the sum of their plaintexts.
 */

// =============================================================================
// Configuration
// =============================================================================

/**
 * Draw both primes from a closed numeric range by trial division.
 * Demonstration sizes only.
 */
export interface PrimeRangeConfig {
  primeMin: bigint;
  primeMax: bigint;
}

/**
 * Draw both primes of the given bit length with Miller-Rabin.
 */
export interface PrimeBitsConfig {
  primeBits: number;
}

export type PaillierKeyConfig = PrimeRangeConfig | PrimeBitsConfig;

// =============================================================================
// Key Material
// =============================================================================

/**
 * Public key (g, n). Safe to publish.
 */
export interface PaillierPublicKey {
  /** Generator, always n + 1 */
  g: bigint;

  /** Modulus n = p * q */
  n: bigint;
}

/**
 * Private key. Held only by the key holder and never serialized onto the wire.
 */
export interface PaillierPrivateKey {
  p: bigint;
  q: bigint;

  /** λ = (p-1)(q-1) */
  lambda: bigint;

  /** μ = λ^(-1) mod n */
  mu: bigint;
}

export interface PaillierKeyPair {
  publicKey: PaillierPublicKey;
  privateKey: PaillierPrivateKey;
}

// =============================================================================
// Ciphertexts
// =============================================================================

/**
 * Output of encryption. The randomness `r` is the witness later needed to
 * prove what the ciphertext holds, so callers keep it private.
 */
export interface EncryptionResult {
  /** c = g^m * r^n mod n² */
  ciphertext: bigint;

  /** r ∈ [1, n) with gcd(r, n) = 1 */
  randomness: bigint;
}

/**
 * Classification of a decrypted signed tally
 */
export type TallyOutcome = 'YES' | 'NO' | 'TIE';
