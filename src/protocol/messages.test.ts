/**
 * Tests for wire message encoding
 */

import { describe, it, expect } from 'vitest';
import { decodeClientMessage, decodeServerMessage, encodeMessage } from './messages.js';
import { ProtocolViolation } from '../errors.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof ProtocolViolation ? err.code : undefined;
  }
  return undefined;
}

describe('Wire messages', () => {
  describe('encodeMessage', () => {
    it('should write big integers as decimal strings and terminate the record', () => {
      expect(encodeMessage({ type: 'vote', encrypted_vote: 12345n, commitment: 678n })).toBe(
        '{"type":"vote","encrypted_vote":"12345","commitment":"678"}\n'
      );
    });

    it('should keep the sign of a tally', () => {
      expect(encodeMessage({ type: 'tally_result', tally: -3n })).toBe(
        '{"type":"tally_result","tally":"-3"}\n'
      );
    });
  });

  describe('decodeClientMessage', () => {
    it('should parse a public key into big integers', () => {
      expect(decodeClientMessage('{"type":"public_key","public_key":{"g":"3234","n":"3233"}}')).toEqual({
        type: 'public_key',
        public_key: { g: 3234n, n: 3233n },
      });
    });

    it('should parse a proof response', () => {
      expect(decodeClientMessage('{"type":"zkp_response","u":"10","v":"20","w":"30"}')).toEqual({
        type: 'zkp_response',
        u: 10n,
        v: 20n,
        w: 30n,
      });
    });

    it('should reject a key whose generator is not n + 1', () => {
      expect(
        codeOf(() => decodeClientMessage('{"type":"public_key","public_key":{"g":"5","n":"3233"}}'))
      ).toBe('MALFORMED_MESSAGE');
    });

    it('should reject invalid JSON', () => {
      expect(() => decodeClientMessage('not json')).toThrow('Malformed message: not valid JSON');
    });

    it('should reject unknown types', () => {
      expect(codeOf(() => decodeClientMessage('{"type":"shutdown"}'))).toBe('MALFORMED_MESSAGE');
    });

    it('should reject numbers where decimal strings are required', () => {
      expect(
        codeOf(() => decodeClientMessage('{"type":"vote","encrypted_vote":12,"commitment":"3"}'))
      ).toBe('MALFORMED_MESSAGE');
    });

    it('should reject a negative ciphertext', () => {
      expect(
        codeOf(() => decodeClientMessage('{"type":"vote","encrypted_vote":"-12","commitment":"3"}'))
      ).toBe('MALFORMED_MESSAGE');
    });

    it('should reject server records', () => {
      expect(codeOf(() => decodeClientMessage('{"type":"vote_received"}'))).toBe(
        'MALFORMED_MESSAGE'
      );
    });
  });

  describe('decodeServerMessage', () => {
    it('should parse a role assignment', () => {
      expect(decodeServerMessage('{"type":"client_id","client_id":"C1234","key_holder":true}')).toEqual({
        type: 'client_id',
        client_id: 'C1234',
        key_holder: true,
      });
    });

    it('should parse an encrypted sum', () => {
      expect(
        decodeServerMessage('{"type":"encrypted_sum","encrypted_sum":"999","vote_count":3}')
      ).toEqual({ type: 'encrypted_sum', encrypted_sum: 999n, vote_count: 3 });
    });

    it('should accept an error without a code', () => {
      expect(decodeServerMessage('{"type":"error","message":"nope"}')).toEqual({
        type: 'error',
        message: 'nope',
      });
    });

    it('should read back what it encodes', () => {
      const line = encodeMessage({ type: 'zkp_challenge', challenge: 1717n });
      expect(decodeServerMessage(line.trim())).toEqual({ type: 'zkp_challenge', challenge: 1717n });
    });
  });
});
