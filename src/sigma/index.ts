/**
 * Sigma Proof Engine
 *
 * Schnorr-style proof bound to a Paillier ciphertext. The prover shows it
 * knows the plaintext and randomness behind c without revealing either.
 *
 *   commit:    a = g^x * s^n             mod n²
 *   challenge: e ∈ [1, n)
 *   respond:   v = x - e*m               mod n
 *              w = s * r^(-e)            mod n
 *   verify:    g^v * w^n * c^e == a      mod n²
 *
 * The check holds because g^v * w^n * c^e = g^(x-em) * s^n * r^(-en) * g^(em) * r^(en).
 * Answering with any other plaintext leaves a stray factor g^(e(m-m')),
 * which is 1 only when n divides e(m-m').
 *
 * @module sigma
 */

import { mod, modInverse, modPow, randomBigInt, randomCoprime } from '../utils/mod-arithmetic.js';
import type { PaillierPublicKey } from '../paillier/types.js';
import type {
  CommitmentPair,
  CommitmentSecret,
  ProofWitness,
  SigmaChallenge,
  SigmaCommitment,
  SigmaResponse,
} from './types.js';

/**
 * Commitment from explicit ephemeral values
 */
export function commitWith(secret: CommitmentSecret, publicKey: PaillierPublicKey): SigmaCommitment {
  const { g, n } = publicKey;
  const n2 = n * n;
  return {
    a: (modPow(g, secret.x, n2) * modPow(secret.s, n, n2)) % n2,
  };
}

/**
 * Draw fresh (x, s) and commit to them.
 *
 * x ∈ [1, n), s ∈ [1, n) coprime to n
 */
export function commit(publicKey: PaillierPublicKey): CommitmentPair {
  const secret: CommitmentSecret = {
    x: randomBigInt(1n, publicKey.n),
    s: randomCoprime(publicKey.n),
  };

  return { commitment: commitWith(secret, publicKey), secret };
}

/**
 * Fresh challenge e ∈ [1, n)
 */
export function challenge(publicKey: PaillierPublicKey): SigmaChallenge {
  return { e: randomBigInt(1n, publicKey.n) };
}

/**
 * Answer a challenge from the commitment secret and the witness.
 *
 * @throws {RangeError} If the witness randomness is not invertible mod n
 */
export function respond(
  secret: CommitmentSecret,
  challengeValue: SigmaChallenge,
  witness: ProofWitness,
  publicKey: PaillierPublicKey
): SigmaResponse {
  const { n } = publicKey;
  const { e } = challengeValue;

  const v = mod(secret.x - e * witness.value, n);
  const rInverse = modInverse(witness.randomness, n);
  const w = (mod(secret.s, n) * modPow(rInverse, e, n)) % n;

  return { v, w };
}

/**
 * Accept iff g^v * w^n * c^e ≡ a (mod n²)
 */
export function verify(
  commitment: SigmaCommitment,
  response: SigmaResponse,
  challengeValue: SigmaChallenge,
  ciphertext: bigint,
  publicKey: PaillierPublicKey
): boolean {
  const { g, n } = publicKey;
  const n2 = n * n;

  if (commitment.a <= 0n || commitment.a >= n2) {
    return false;
  }
  if (response.v < 0n || response.w <= 0n) {
    return false;
  }

  const lhs =
    (((modPow(g, response.v, n2) * modPow(response.w, n, n2)) % n2) *
      modPow(ciphertext, challengeValue.e, n2)) %
    n2;

  return lhs === commitment.a;
}

export const SigmaProof = {
  commit,
  commitWith,
  challenge,
  respond,
  verify,
};

export type {
  SigmaCommitment,
  CommitmentSecret,
  CommitmentPair,
  ProofWitness,
  SigmaChallenge,
  SigmaResponse,
} from './types.js';
