/**
 * Sigma Proof Type Definitions
 *
 * Three-move proof of knowledge of (m, r) such that c = g^m * r^n mod n².
 */

/**
 * First message, a = g^x * s^n mod n²
 */
export interface SigmaCommitment {
  a: bigint;
}

/**
 * Ephemeral values behind a commitment. Single use: answering two
 * challenges with the same (x, s) reveals the witness.
 */
export interface CommitmentSecret {
  x: bigint;
  s: bigint;
}

/**
 * What the prover knows about its ciphertext
 */
export interface ProofWitness {
  /** Plaintext m */
  value: bigint;

  /** Encryption randomness r */
  randomness: bigint;
}

/**
 * Verifier's random scalar e ∈ [1, n)
 */
export interface SigmaChallenge {
  e: bigint;
}

/**
 * Prover's answer: v = (x - e*m) mod n, w = s * r^(-e) mod n
 */
export interface SigmaResponse {
  v: bigint;
  w: bigint;
}

/**
 * Commitment together with the secret needed to answer a challenge
 */
export interface CommitmentPair {
  commitment: SigmaCommitment;
  secret: CommitmentSecret;
}
