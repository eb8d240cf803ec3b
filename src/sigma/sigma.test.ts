/**
 * Tests for the ciphertext-bound Sigma proof
 */

import { describe, it, expect } from 'vitest';
import { challenge, commit, commitWith, respond, verify } from './index.js';
import { encrypt, encryptWithRandomness, generateKeyPair, keyPairFromPrimes } from '../paillier/index.js';

describe('SigmaProof', () => {
  const { publicKey } = keyPairFromPrimes(61n, 53n);

  describe('commit', () => {
    it('should compute a = g^x * s^n mod n²', () => {
      // g^1 * 1^n = g
      expect(commitWith({ x: 1n, s: 1n }, publicKey).a).toBe(3234n);
    });

    it('should draw fresh ephemeral values each time', () => {
      const first = commit(publicKey);
      const second = commit(publicKey);

      expect(first.secret).not.toEqual(second.secret);
      expect(first.commitment.a).toBe(commitWith(first.secret, publicKey).a);
    });
  });

  describe('challenge', () => {
    it('should lie in [1, n)', () => {
      for (let i = 0; i < 50; i++) {
        const { e } = challenge(publicKey);
        expect(e).toBeGreaterThanOrEqual(1n);
        expect(e).toBeLessThan(publicKey.n);
      }
    });
  });

  describe('honest prover', () => {
    it('should always verify', () => {
      for (const value of [1n, -1n, 0n, 7n]) {
        const { ciphertext, randomness } = encrypt(value, publicKey);
        const { commitment, secret } = commit(publicKey);
        const e = challenge(publicKey);
        const response = respond(secret, e, { value, randomness }, publicKey);

        expect(verify(commitment, response, e, ciphertext, publicKey)).toBe(true);
      }
    });

    it('should verify with hand-picked values', () => {
      // c = Enc(-1; r = 2), a = Commit(x = 5, s = 3), e = 11
      const ciphertext = encryptWithRandomness(-1n, 2n, publicKey);
      const secret = { x: 5n, s: 3n };
      const commitment = commitWith(secret, publicKey);
      const response = respond(secret, { e: 11n }, { value: -1n, randomness: 2n }, publicKey);

      // v = 5 - 11 * (-1) = 16
      expect(response.v).toBe(16n);
      expect(verify(commitment, response, { e: 11n }, ciphertext, publicKey)).toBe(true);
    });

    it('should verify under generated keys', () => {
      const keyPair = generateKeyPair();
      const { ciphertext, randomness } = encrypt(1n, keyPair.publicKey);
      const { commitment, secret } = commit(keyPair.publicKey);
      const e = challenge(keyPair.publicKey);
      const response = respond(secret, e, { value: 1n, randomness }, keyPair.publicKey);

      expect(verify(commitment, response, e, ciphertext, keyPair.publicKey)).toBe(true);
    });
  });

  describe('fraudulent prover', () => {
    it('should fail when answering with the opposite vote', () => {
      for (const value of [1n, -1n]) {
        for (let round = 0; round < 20; round++) {
          const { ciphertext, randomness } = encrypt(value, publicKey);
          const { commitment, secret } = commit(publicKey);
          const e = challenge(publicKey);
          const forged = respond(secret, e, { value: -value, randomness }, publicKey);

          expect(verify(commitment, forged, e, ciphertext, publicKey)).toBe(false);
        }
      }
    });

    it('should fail against a different ciphertext', () => {
      const secret = { x: 5n, s: 3n };
      const commitment = commitWith(secret, publicKey);
      const e = { e: 5n };
      const response = respond(secret, e, { value: 1n, randomness: 2n }, publicKey);

      const honest = encryptWithRandomness(1n, 2n, publicKey);
      const other = encryptWithRandomness(1n, 3n, publicKey);
      expect(verify(commitment, response, e, honest, publicKey)).toBe(true);
      expect(verify(commitment, response, e, other, publicKey)).toBe(false);
    });

    it('should fail when the response is checked against another challenge', () => {
      const { ciphertext, randomness } = encrypt(1n, publicKey);
      const { commitment, secret } = commit(publicKey);
      const response = respond(secret, { e: 7n }, { value: 1n, randomness }, publicKey);

      expect(verify(commitment, response, { e: 8n }, ciphertext, publicKey)).toBe(false);
    });

    it('should reject out-of-range commitments', () => {
      const { ciphertext, randomness } = encrypt(1n, publicKey);
      const { secret } = commit(publicKey);
      const e = { e: 3n };
      const response = respond(secret, e, { value: 1n, randomness }, publicKey);

      expect(verify({ a: 0n }, response, e, ciphertext, publicKey)).toBe(false);
      expect(verify({ a: publicKey.n * publicKey.n }, response, e, ciphertext, publicKey)).toBe(
        false
      );
    });
  });
});
