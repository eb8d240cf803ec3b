/**
 * Tests for the voting session coordinator
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SessionCoordinator } from './coordinator.js';
import { SessionPhase, VoterStatus, type IssuedChallenge, type Voter } from './types.js';
import { getNextPhase, isValidTransition, verifyAuditLog } from './state-machine.js';
import { decrypt, encrypt, keyPairFromPrimes } from '../paillier/index.js';
import { commit, respond } from '../sigma/index.js';
import type { CommitmentPair } from '../sigma/types.js';
import { ProtocolTimeout, VotingError } from '../errors.js';

const keyPair = keyPairFromPrimes(61n, 53n);
const { publicKey } = keyPair;

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof VotingError) return err.code;
    throw err;
  }
  return undefined;
}

interface Ballot {
  voter: Voter;
  value: bigint;
  randomness: bigint;
  ciphertext: bigint;
  proof: CommitmentPair;
}

function cast(session: SessionCoordinator, voter: Voter, value: bigint): Ballot {
  const { ciphertext, randomness } = encrypt(value, publicKey);
  const proof = commit(publicKey);
  session.recordVote(voter.id, ciphertext, proof.commitment);
  return { voter, value, randomness, ciphertext, proof };
}

function answer(
  session: SessionCoordinator,
  ballot: Ballot,
  issued: IssuedChallenge[],
  claimedValue: bigint = ballot.value
) {
  const entry = issued.find((c) => c.voterId === ballot.voter.id);
  if (!entry) throw new Error(`no challenge for ${ballot.voter.id}`);

  const { v, w } = respond(
    ballot.proof.secret,
    entry.challenge,
    { value: claimedValue, randomness: ballot.randomness },
    publicKey
  );
  return session.recordProofResponse(ballot.voter.id, { u: ballot.proof.commitment.a, v, w });
}

describe('SessionCoordinator', () => {
  let session: SessionCoordinator;

  beforeEach(() => {
    session = new SessionCoordinator({ id: 'test-session', maxVoters: 10 });
  });

  describe('constructor', () => {
    it('should start in REGISTERING with a creation audit entry', () => {
      const status = session.getStatus();

      expect(status.sessionId).toBe('test-session');
      expect(status.phase).toBe(SessionPhase.REGISTERING);
      expect(status.nextPhase).toBe(SessionPhase.KEY_DISTRIBUTION);
      expect(status.voters.registered).toBe(0);
      expect(session.getAuditLog()).toHaveLength(1);
      expect(session.verifyAuditLog()).toBe(true);
    });

    it('should generate a session id when none is given', () => {
      expect(new SessionCoordinator().getSessionId()).toMatch(/^session-[0-9a-f]{16}$/);
    });

    it('should reject an out-of-range voter cap', () => {
      expect(() => new SessionCoordinator({ maxVoters: 0 })).toThrow('maxVoters must be');
      expect(() => new SessionCoordinator({ maxVoters: 9001 })).toThrow('maxVoters must be');
    });
  });

  describe('registration', () => {
    it('should designate the first registrant as key holder', () => {
      const first = session.registerVoter();
      const second = session.registerVoter();

      expect(first.isKeyHolder).toBe(true);
      expect(second.isKeyHolder).toBe(false);
      expect(session.getKeyHolderId()).toBe(first.id);
      expect(session.getPhase()).toBe(SessionPhase.KEY_DISTRIBUTION);
    });

    it('should hand out distinct identifiers from the C1000-C9999 namespace', () => {
      const ids = new Set<string>();
      for (let i = 0; i < 10; i++) {
        const { id } = session.registerVoter();
        expect(id).toMatch(/^C[1-9]\d{3}$/);
        ids.add(id);
      }
      expect(ids.size).toBe(10);
    });

    it('should reject a repeated identity', () => {
      session.registerVoter('alice');
      expect(errorCode(() => session.registerVoter('alice'))).toBe('DUPLICATE_VOTER');
    });

    it('should reject registration beyond the cap', () => {
      const small = new SessionCoordinator({ maxVoters: 2 });
      small.registerVoter();
      small.registerVoter();
      expect(errorCode(() => small.registerVoter())).toBe('SESSION_FULL');
    });

    it('should refuse registration once tallying has begun', () => {
      const holder = session.registerVoter();
      session.publishPublicKey(holder.id, publicKey);
      session.beginTally();

      expect(errorCode(() => session.registerVoter())).toBe('SESSION_ENDED');
    });
  });

  describe('public key distribution', () => {
    it('should only accept the key from the key holder', () => {
      const holder = session.registerVoter();
      const voter = session.registerVoter();

      expect(errorCode(() => session.publishPublicKey(voter.id, publicKey))).toBe('NOT_KEY_HOLDER');

      session.publishPublicKey(holder.id, publicKey);
      expect(session.getPhase()).toBe(SessionPhase.COLLECTING);
      expect(session.getPublicKey()).toEqual({ g: 3234n, n: 3233n });

      expect(errorCode(() => session.publishPublicKey(holder.id, publicKey))).toBe(
        'PUBLIC_KEY_ALREADY_SET'
      );
    });

    it('should resolve waiters when the key is published', async () => {
      const holder = session.registerVoter();
      const pending = session.whenPublicKey(1000);

      session.publishPublicKey(holder.id, publicKey);

      await expect(pending).resolves.toEqual(publicKey);
      await expect(session.whenPublicKey()).resolves.toEqual(publicKey);
    });

    it('should time out when no key arrives', async () => {
      session.registerVoter();
      await expect(session.whenPublicKey(10)).rejects.toBeInstanceOf(ProtocolTimeout);
    });

    it('should reject waiters when the key holder leaves', async () => {
      const holder = session.registerVoter();
      const pending = session.whenPublicKey();

      session.withdrawVoter(holder.id);

      await expect(pending).rejects.toThrow('Key holder withdrew');
      await expect(session.whenPublicKey()).rejects.toThrow('Key holder withdrew');
    });

    it('should reject waiters when the session closes', async () => {
      session.registerVoter();
      const pending = session.whenPublicKey();

      session.close();

      await expect(pending).rejects.toThrow('Voting session has ended');
    });
  });

  describe('ballot collection', () => {
    let holder: Voter;

    beforeEach(() => {
      holder = session.registerVoter();
    });

    it('should refuse ballots before the key is published', () => {
      const { ciphertext } = encrypt(1n, publicKey);
      expect(errorCode(() => session.recordVote(holder.id, ciphertext, { a: 3234n }))).toBe(
        'VOTE_OUT_OF_PHASE'
      );
    });

    it('should record one ballot per voter', () => {
      session.publishPublicKey(holder.id, publicKey);
      cast(session, holder, 1n);

      expect(session.getVoter(holder.id)?.status).toBe(VoterStatus.VOTED);
      expect(session.getStatus().voters.voted).toBe(1);

      const { ciphertext } = encrypt(-1n, publicKey);
      expect(errorCode(() => session.recordVote(holder.id, ciphertext, { a: 3234n }))).toBe(
        'DUPLICATE_VOTE'
      );
    });

    it('should reject malformed ballots', () => {
      session.publishPublicKey(holder.id, publicKey);
      const { ciphertext } = encrypt(1n, publicKey);

      expect(errorCode(() => session.recordVote(holder.id, 0n, { a: 3234n }))).toBe(
        'INVALID_CIPHERTEXT'
      );
      expect(errorCode(() => session.recordVote(holder.id, ciphertext, { a: 61n }))).toBe(
        'INVALID_COMMITMENT'
      );
      expect(errorCode(() => session.recordVote('C0000', ciphertext, { a: 3234n }))).toBe(
        'UNKNOWN_VOTER'
      );
    });

    it('should refuse ballots after the tally', () => {
      session.publishPublicKey(holder.id, publicKey);
      session.beginTally();

      const { ciphertext } = encrypt(1n, publicKey);
      expect(errorCode(() => session.recordVote(holder.id, ciphertext, { a: 3234n }))).toBe(
        'VOTING_CLOSED'
      );
    });
  });

  describe('tally', () => {
    it('should refuse to tally without a public key and keep the phase', () => {
      expect(errorCode(() => session.beginTally())).toBe('NO_PUBLIC_KEY');

      session.registerVoter();
      expect(errorCode(() => session.beginTally())).toBe('NO_PUBLIC_KEY');
      expect(session.getPhase()).toBe(SessionPhase.KEY_DISTRIBUTION);
    });

    it('should yield an encryption of zero with no ballots', () => {
      const holder = session.registerVoter();
      session.publishPublicKey(holder.id, publicKey);

      const tally = session.beginTally();

      expect(tally.encryptedSum).toBe(1n);
      expect(tally.voteCount).toBe(0);
      expect(decrypt(tally.encryptedSum, keyPair)).toBe(0n);
      expect(errorCode(() => session.beginTally())).toBe('TALLY_ALREADY_STARTED');
    });

    it('should only accept the result from the key holder', () => {
      const holder = session.registerVoter();
      const voter = session.registerVoter();
      session.publishPublicKey(holder.id, publicKey);

      expect(errorCode(() => session.recordTallyResult(holder.id, 0n))).toBe('TALLY_NOT_STARTED');

      session.beginTally();

      expect(errorCode(() => session.recordTallyResult(voter.id, 0n))).toBe('NOT_KEY_HOLDER');
      expect(session.recordTallyResult(holder.id, 0n).outcome).toBe('TIE');
      expect(errorCode(() => session.recordTallyResult(holder.id, 0n))).toBe(
        'TALLY_ALREADY_REPORTED'
      );
    });
  });

  describe('proof round', () => {
    let ballots: Ballot[];

    beforeEach(() => {
      const holder = session.registerVoter();
      session.publishPublicKey(holder.id, publicKey);
      const second = session.registerVoter();
      const third = session.registerVoter();

      ballots = [cast(session, holder, 1n), cast(session, second, -1n), cast(session, third, 1n)];
    });

    it('should verify every honest voter and close the session', () => {
      const listener = vi.fn();
      session.onReport(listener);

      const tally = session.beginTally();
      expect(tally.voteCount).toBe(3);

      const result = decrypt(tally.encryptedSum, keyPair);
      expect(result).toBe(1n);
      session.recordTallyResult(ballots[0]!.voter.id, result);

      const issued = session.issueChallenges();
      expect(issued).toHaveLength(3);
      expect(session.getPhase()).toBe(SessionPhase.VERIFYING);

      for (const ballot of ballots) {
        expect(answer(session, ballot, issued)).toEqual({
          voterId: ballot.voter.id,
          valid: true,
          outcome: 'verified',
        });
      }

      expect(session.getPhase()).toBe(SessionPhase.CLOSED);

      const report = session.getReport();
      expect(report?.validCount).toBe(3);
      expect(report?.fraudDetected).toBe(false);
      expect(report?.tally?.outcome).toBe('YES');
      expect(report?.results.map((r) => r.voterId)).toEqual(ballots.map((b) => b.voter.id));
      expect(listener).toHaveBeenCalledTimes(1);
      expect(session.verifyAuditLog()).toBe(true);
    });

    it('should flag a proof computed for the opposite vote', () => {
      session.beginTally();
      const issued = session.issueChallenges();

      const [first, liar, third] = ballots;
      answer(session, first!, issued);
      const entry = answer(session, liar!, issued, 1n);
      answer(session, third!, issued);

      expect(entry).toEqual({ voterId: liar!.voter.id, valid: false, outcome: 'failed' });
      expect(session.getVoter(liar!.voter.id)?.status).toBe(VoterStatus.FRAUD);

      const report = session.getReport();
      expect(report?.validCount).toBe(2);
      expect(report?.fraudDetected).toBe(true);
    });

    it('should fail a response whose u does not echo the stored commitment', () => {
      session.beginTally();
      const issued = session.issueChallenges();

      const ballot = ballots[0]!;
      const entry = issued.find((c) => c.voterId === ballot.voter.id)!;
      const { v, w } = respond(
        ballot.proof.secret,
        entry.challenge,
        { value: ballot.value, randomness: ballot.randomness },
        publicKey
      );

      const result = session.recordProofResponse(ballot.voter.id, {
        u: ballot.proof.commitment.a + 1n,
        v,
        w,
      });
      expect(result.valid).toBe(false);
    });

    it('should reject a second response to the same challenge', () => {
      session.beginTally();
      const issued = session.issueChallenges();

      answer(session, ballots[0]!, issued);
      expect(errorCode(() => answer(session, ballots[0]!, issued))).toBe(
        'NO_OUTSTANDING_CHALLENGE'
      );
    });

    it('should record unreachable voters as withdrawn', () => {
      session.beginTally();
      const gone = ballots[2]!.voter.id;

      const issued = session.issueChallenges((voterId) => voterId !== gone);

      expect(issued.map((c) => c.voterId)).not.toContain(gone);
      expect(session.getOutstandingChallenges()).toHaveLength(2);

      answer(session, ballots[0]!, issued);
      answer(session, ballots[1]!, issued);

      const report = session.getReport();
      expect(report?.results[2]).toEqual({ voterId: gone, valid: false, outcome: 'withdrawn' });
    });

    it('should resolve timed-out and disconnected voters', () => {
      session.beginTally();
      const issued = session.issueChallenges();

      answer(session, ballots[0]!, issued);
      expect(session.expireChallenge(ballots[1]!.voter.id, 'timeout')?.outcome).toBe('timeout');
      expect(session.expireChallenge(ballots[1]!.voter.id, 'timeout')).toBeNull();
      session.withdrawVoter(ballots[2]!.voter.id);

      const report = session.getReport();
      expect(report?.results.map((r) => r.outcome)).toEqual(['verified', 'timeout', 'withdrawn']);
      expect(session.isClosed()).toBe(true);
    });

    it('should close immediately when nobody can be challenged', () => {
      session.beginTally();
      const issued = session.issueChallenges(() => false);

      expect(issued).toHaveLength(0);
      expect(session.isClosed()).toBe(true);
      expect(session.getReport()?.validCount).toBe(0);
    });
  });

  describe('close', () => {
    it('should be idempotent', () => {
      expect(session.close()).toBeNull();
      expect(session.close()).toBeNull();
      expect(session.getPhase()).toBe(SessionPhase.CLOSED);
    });

    it('should report outstanding challenges as withdrawn on shutdown', () => {
      const holder = session.registerVoter();
      session.publishPublicKey(holder.id, publicKey);
      cast(session, holder, -1n);
      session.beginTally();
      session.issueChallenges();

      const report = session.close();

      expect(report?.results).toEqual([{ voterId: holder.id, valid: false, outcome: 'withdrawn' }]);
      expect(session.close()).toBe(report);
    });

    it('should keep the report and audit log when the registry is cleared', () => {
      const holder = session.registerVoter();
      session.publishPublicKey(holder.id, publicKey);
      session.beginTally();
      session.issueChallenges();
      const logLength = session.getAuditLog().length;

      session.clear();

      expect(session.getVoters()).toEqual([]);
      expect(session.getReport()).not.toBeNull();
      expect(session.getAuditLog()).toHaveLength(logLength);
    });
  });

  describe('audit log', () => {
    it('should detect a tampered entry', () => {
      session.registerVoter();
      const log = session.getAuditLog();
      const tampered = log.map((entry, i) => (i === 1 ? { ...entry, data: { voterId: 'C0000' } } : entry));

      expect(verifyAuditLog(log)).toBe(true);
      expect(verifyAuditLog(tampered)).toBe(false);
    });
  });
});

describe('session state machine', () => {
  it('should only allow forward transitions or shutdown', () => {
    expect(isValidTransition(SessionPhase.COLLECTING, SessionPhase.TALLYING)).toBe(true);
    expect(isValidTransition(SessionPhase.COLLECTING, SessionPhase.CLOSED)).toBe(true);
    expect(isValidTransition(SessionPhase.TALLYING, SessionPhase.COLLECTING)).toBe(false);
    expect(isValidTransition(SessionPhase.CLOSED, SessionPhase.REGISTERING)).toBe(false);
  });

  it('should name the next phase', () => {
    expect(getNextPhase(SessionPhase.REGISTERING)).toBe(SessionPhase.KEY_DISTRIBUTION);
    expect(getNextPhase(SessionPhase.VERIFYING)).toBe(SessionPhase.CLOSED);
    expect(getNextPhase(SessionPhase.CLOSED)).toBeNull();
  });
});
