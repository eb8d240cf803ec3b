/**
 * Paillier Cryptosystem
 *
 * Additively homomorphic public-key encryption used to hide individual
 * ballots while still allowing them to be summed:
 *
 *   Enc(m1) * Enc(m2) mod n² = Enc(m1 + m2 mod n)
 *
 * Only the key holder can decrypt, and only the aggregate is ever decrypted.
 *
 * Note: the default parameters use tiny primes so that values stay readable.
 * Real deployments need primes of at least 1024 bits (use `primeBits`).
 *
 * @module paillier
 */

import {
  gcd,
  generatePrime,
  generatePrimeInRange,
  isPrime,
  isProbablePrime,
  mod,
  modInverse,
  modPow,
  randomCoprime,
} from '../utils/mod-arithmetic.js';
import { DecryptionError, EncryptionError, KeyGenerationError } from '../errors.js';
import type {
  EncryptionResult,
  PaillierKeyConfig,
  PaillierKeyPair,
  PaillierPublicKey,
  TallyOutcome,
} from './types.js';

/**
 * Prime range used when nothing else is configured
 */
export const DEFAULT_KEY_CONFIG: PaillierKeyConfig = {
  primeMin: 50n,
  primeMax: 80n,
};

const MAX_PRIME_DRAWS = 64;

// =============================================================================
// Key Generation
// =============================================================================

/**
 * Build a key pair from two known primes.
 *
 * @throws {KeyGenerationError} If p = q, either is not prime, or λ is not invertible mod n
 */
export function keyPairFromPrimes(p: bigint, q: bigint): PaillierKeyPair {
  if (p === q) {
    throw new KeyGenerationError('Primes p and q must be distinct', { p: p.toString() });
  }

  const primality = p < 1_000_000n && q < 1_000_000n ? isPrime : isProbablePrime;
  if (!primality(p) || !primality(q)) {
    throw new KeyGenerationError('Both p and q must be prime', {
      p: p.toString(),
      q: q.toString(),
    });
  }

  const n = p * q;
  const lambda = (p - 1n) * (q - 1n);

  if (gcd(lambda, n) !== 1n) {
    throw new KeyGenerationError('λ is not invertible mod n', {
      p: p.toString(),
      q: q.toString(),
    });
  }

  return {
    publicKey: { g: n + 1n, n },
    privateKey: { p, q, lambda, mu: modInverse(lambda, n) },
  };
}

/**
 * Generate a fresh key pair.
 *
 * Draws p, then keeps drawing q until it differs from p.
 *
 * @throws {KeyGenerationError} If the range holds fewer than two primes or is malformed
 */
export function generateKeyPair(
  config: PaillierKeyConfig = DEFAULT_KEY_CONFIG
): PaillierKeyPair {
  if ('primeBits' in config) {
    const { primeBits } = config;
    if (!Number.isInteger(primeBits) || primeBits < 4) {
      throw new KeyGenerationError('primeBits must be an integer of at least 4', { primeBits });
    }

    const p = generatePrime(primeBits);
    let q = generatePrime(primeBits);
    while (q === p) {
      q = generatePrime(primeBits);
    }
    return keyPairFromPrimes(p, q);
  }

  const { primeMin, primeMax } = config;
  if (primeMin < 3n || primeMax <= primeMin) {
    throw new KeyGenerationError('Prime range must satisfy 3 <= primeMin < primeMax', {
      primeMin: primeMin.toString(),
      primeMax: primeMax.toString(),
    });
  }

  const p = generatePrimeInRange(primeMin, primeMax);
  if (p === null) {
    throw new KeyGenerationError('No prime found in range', {
      primeMin: primeMin.toString(),
      primeMax: primeMax.toString(),
    });
  }

  for (let draw = 0; draw < MAX_PRIME_DRAWS; draw++) {
    const q = generatePrimeInRange(primeMin, primeMax);
    if (q !== null && q !== p) {
      return keyPairFromPrimes(p, q);
    }
  }

  throw new KeyGenerationError('Prime range does not hold two distinct primes', {
    primeMin: primeMin.toString(),
    primeMax: primeMax.toString(),
  });
}

// =============================================================================
// Encryption
// =============================================================================

/**
 * True if |value| < n/2
 */
export function isPlaintextInRange(value: bigint, publicKey: PaillierPublicKey): boolean {
  const magnitude = value < 0n ? -value : value;
  return 2n * magnitude < publicKey.n;
}

/**
 * Encrypt a signed value with caller-supplied randomness: c = g^m * r^n mod n²
 *
 * @throws {EncryptionError} If the value is outside (-n/2, n/2) or r is not coprime to n
 */
export function encryptWithRandomness(
  value: bigint,
  randomness: bigint,
  publicKey: PaillierPublicKey
): bigint {
  const { g, n } = publicKey;

  if (!isPlaintextInRange(value, publicKey)) {
    throw new EncryptionError(`Plaintext must lie in (-n/2, n/2)`, {
      n: n.toString(),
    });
  }
  if (randomness < 1n || randomness >= n || gcd(randomness, n) !== 1n) {
    throw new EncryptionError('Randomness must lie in [1, n) and be coprime to n');
  }

  const n2 = n * n;
  // g has order n in Z*_{n²}, so a negative exponent reduces to its residue mod n
  return (modPow(g, mod(value, n), n2) * modPow(randomness, n, n2)) % n2;
}

/**
 * Encrypt a signed value under the public key.
 *
 * @returns The ciphertext and the randomness used, which is the proof witness
 */
export function encrypt(value: bigint, publicKey: PaillierPublicKey): EncryptionResult {
  const randomness = randomCoprime(publicKey.n);
  return {
    ciphertext: encryptWithRandomness(value, randomness, publicKey),
    randomness,
  };
}

/**
 * True if c lies in [1, n²) and is a unit mod n²
 */
export function isValidCiphertext(ciphertext: bigint, publicKey: PaillierPublicKey): boolean {
  const n2 = publicKey.n * publicKey.n;
  return ciphertext > 0n && ciphertext < n2 && gcd(ciphertext, publicKey.n) === 1n;
}

// =============================================================================
// Homomorphic Addition
// =============================================================================

/**
 * Homomorphic sum: the product of all ciphertexts mod n².
 *
 * Order does not matter. An empty list yields 1, a valid encryption of 0.
 */
export function addCiphertexts(
  ciphertexts: readonly bigint[],
  publicKey: PaillierPublicKey
): bigint {
  const n2 = publicKey.n * publicKey.n;
  return ciphertexts.reduce((acc, c) => (acc * mod(c, n2)) % n2, 1n);
}

// =============================================================================
// Decryption
// =============================================================================

/**
 * Decrypt a ciphertext and re-center the result into (-n/2, n/2].
 *
 * L = (c^λ mod n² - 1) / n, m = L * μ mod n
 *
 * @throws {DecryptionError} If the division is not exact or c is out of range
 */
export function decrypt(ciphertext: bigint, keyPair: PaillierKeyPair): bigint {
  const { n } = keyPair.publicKey;
  const { lambda, mu } = keyPair.privateKey;
  const n2 = n * n;

  if (ciphertext <= 0n || ciphertext >= n2) {
    throw new DecryptionError('Ciphertext must lie in [1, n²)', {
      ciphertext: ciphertext.toString(),
    });
  }

  const numerator = modPow(ciphertext, lambda, n2) - 1n;
  if (numerator % n !== 0n) {
    throw new DecryptionError('Ciphertext is not decodable under this key', {
      ciphertext: ciphertext.toString(),
    });
  }

  const m = ((numerator / n) * mu) % n;
  return m > n / 2n ? m - n : m;
}

/**
 * YES if the signed tally is positive, NO if negative, TIE at zero
 */
export function classifyTally(tally: bigint): TallyOutcome {
  if (tally > 0n) return 'YES';
  if (tally < 0n) return 'NO';
  return 'TIE';
}

export const Paillier = {
  generateKeyPair,
  keyPairFromPrimes,
  encrypt,
  encryptWithRandomness,
  isPlaintextInRange,
  isValidCiphertext,
  addCiphertexts,
  decrypt,
  classifyTally,
};

export type {
  PaillierKeyConfig,
  PrimeRangeConfig,
  PrimeBitsConfig,
  PaillierPublicKey,
  PaillierPrivateKey,
  PaillierKeyPair,
  EncryptionResult,
  TallyOutcome,
} from './types.js';
