/**
 * Modular arithmetic utilities for Paillier encryption and Sigma proofs
 */

import { randomBytes } from 'crypto';

/**
 * Modular exponentiation: (base^exp) mod m
 * Uses square-and-multiply for efficiency
 */
export function modPow(base: bigint, exp: bigint, m: bigint): bigint {
  if (m === 1n) return 0n;
  if (exp < 0n) {
    return modPow(modInverse(base, m), -exp, m);
  }

  let result = 1n;
  base = mod(base, m);

  while (exp > 0n) {
    if (exp & 1n) {
      result = (result * base) % m;
    }
    exp >>= 1n;
    base = (base * base) % m;
  }

  return result;
}

/**
 * Extended Euclidean Algorithm
 * Returns [gcd, x, y] such that ax + by = gcd(a, b)
 */
export function extendedGcd(a: bigint, b: bigint): [bigint, bigint, bigint] {
  let [oldR, r] = [a, b];
  let [oldS, s] = [1n, 0n];
  let [oldT, t] = [0n, 1n];

  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
    [oldT, t] = [t, oldT - quotient * t];
  }

  return [oldR, oldS, oldT];
}

/**
 * Modular multiplicative inverse: a^(-1) mod m
 * Throws if inverse doesn't exist (gcd(a, m) !== 1)
 */
export function modInverse(a: bigint, m: bigint): bigint {
  a = mod(a, m);

  const [g, x] = extendedGcd(a, m);

  if (g !== 1n) {
    throw new RangeError(`Modular inverse does not exist: gcd(${a}, ${m}) = ${g}`);
  }

  return mod(x, m);
}

/**
 * Positive modulo operation (always returns positive result)
 */
export function mod(a: bigint, m: bigint): bigint {
  return ((a % m) + m) % m;
}

/**
 * Generate a random bigint in range [min, max)
 */
export function randomBigInt(min: bigint, max: bigint): bigint {
  const range = max - min;
  if (range <= 0n) {
    throw new RangeError(`Empty range [${min}, ${max})`);
  }
  const bytesNeeded = Math.ceil(range.toString(2).length / 8) + 8; // Extra bytes for uniformity

  let randomValue = 0n;
  for (const byte of randomBytes(bytesNeeded)) {
    randomValue = (randomValue << 8n) | BigInt(byte);
  }

  return min + (randomValue % range);
}

/**
 * Random element of [1, n) coprime to n, drawn by rejection sampling.
 */
export function randomCoprime(n: bigint): bigint {
  while (true) {
    const candidate = randomBigInt(1n, n);
    if (gcd(candidate, n) === 1n) {
      return candidate;
    }
  }
}

/**
 * Deterministic primality test by trial division.
 * Only suitable for the small demonstration ranges.
 */
export function isPrime(n: bigint): boolean {
  if (n < 2n) return false;
  if (n < 4n) return true;
  if (n % 2n === 0n) return false;

  for (let d = 3n; d * d <= n; d += 2n) {
    if (n % d === 0n) return false;
  }

  return true;
}

/**
 * Check if a number is probably prime using Miller-Rabin
 */
export function isProbablePrime(n: bigint, k: number = 20): boolean {
  if (n < 2n) return false;
  if (n === 2n || n === 3n) return true;
  if (n % 2n === 0n) return false;
  if (n < 1000n) return isPrime(n);

  // Write n-1 as 2^r * d
  let r = 0n;
  let d = n - 1n;
  while (d % 2n === 0n) {
    r++;
    d /= 2n;
  }

  witnessLoop: for (let i = 0; i < k; i++) {
    const a = randomBigInt(2n, n - 2n);
    let x = modPow(a, d, n);

    if (x === 1n || x === n - 1n) continue;

    for (let j = 0n; j < r - 1n; j++) {
      x = modPow(x, 2n, n);
      if (x === n - 1n) continue witnessLoop;
    }

    return false;
  }

  return true;
}

/**
 * Generate a random prime of specified bit length
 */
export function generatePrime(bits: number): bigint {
  const min = 1n << BigInt(bits - 1);
  const max = 1n << BigInt(bits);

  while (true) {
    let candidate = randomBigInt(min, max);

    // Make sure it's odd
    if (candidate % 2n === 0n) candidate++;

    if (candidate < max && isProbablePrime(candidate)) {
      return candidate;
    }
  }
}

/**
 * Draw a random prime from the closed range [min, max].
 * Returns null when no prime turned up within `maxAttempts` draws.
 */
export function generatePrimeInRange(
  min: bigint,
  max: bigint,
  maxAttempts: number = 10_000
): bigint | null {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const candidate = randomBigInt(min, max + 1n);
    if (isPrime(candidate)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Greatest common divisor
 */
export function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}
