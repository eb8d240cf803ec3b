/**
 * Proof Rounds
 *
 * Issues one challenge per recorded ballot, checks responses against the
 * stored ciphertext and commitment, and assembles the verification report.
 * A failed proof is recorded, never thrown.
 */

import { ProtocolViolation, SessionError } from '../errors.js';
import { challenge as drawChallenge, verify } from '../sigma/index.js';
import { addAuditEntry, transitionPhase } from './state-machine.js';
import {
  SessionEventType,
  SessionPhase,
  VoterStatus,
  type IssuedChallenge,
  type ProofSubmission,
  type SessionState,
  type VerificationEntry,
  type VerificationOutcome,
  type VerificationReport,
} from './types.js';

function recordVerification(
  state: SessionState,
  voterId: string,
  outcome: VerificationOutcome
): VerificationEntry {
  const entry: VerificationEntry = { voterId, valid: outcome === 'verified', outcome };
  state.verifications.set(voterId, entry);

  const voter = state.voters.get(voterId);
  if (voter) {
    switch (outcome) {
      case 'verified':
        voter.status = VoterStatus.VERIFIED;
        break;
      case 'withdrawn':
        voter.status = VoterStatus.WITHDRAWN;
        break;
      default:
        voter.status = VoterStatus.FRAUD;
    }
  }

  state.updatedAt = new Date();
  addAuditEntry(state, SessionEventType.PROOF_CHECKED, { voterId, valid: entry.valid, outcome });

  return entry;
}

/**
 * Draw a fresh challenge for every ballot and move to VERIFYING.
 *
 * Voters that are no longer reachable are recorded as withdrawn instead.
 *
 * @param isReachable - Whether a voter can still receive its challenge
 * @throws {SessionError} If the session is not tallying
 */
export function issueChallenges(
  state: SessionState,
  isReachable: (voterId: string) => boolean
): IssuedChallenge[] {
  const publicKey = state.publicKey;
  if (state.phase !== SessionPhase.TALLYING || publicKey === null) {
    throw new SessionError(
      `Cannot issue challenges in ${state.phase} phase`,
      'INVALID_PHASE',
      { currentPhase: state.phase, expectedPhase: SessionPhase.TALLYING }
    );
  }

  transitionPhase(state, SessionPhase.CHALLENGING);

  const issued: IssuedChallenge[] = [];

  for (const vote of state.votes.values()) {
    const voter = state.voters.get(vote.voterId);
    if (!voter || voter.status === VoterStatus.WITHDRAWN || !isReachable(vote.voterId)) {
      recordVerification(state, vote.voterId, 'withdrawn');
      continue;
    }

    const challenge = drawChallenge(publicKey);
    state.challenges.set(vote.voterId, {
      voterId: vote.voterId,
      challenge,
      issuedAt: new Date(),
    });
    voter.status = VoterStatus.CHALLENGED;

    addAuditEntry(state, SessionEventType.CHALLENGE_ISSUED, {
      voterId: vote.voterId,
      challenge: challenge.e.toString(),
    });

    issued.push({ voterId: vote.voterId, challenge });
  }

  transitionPhase(state, SessionPhase.VERIFYING, { outstanding: issued.length });

  return issued;
}

/**
 * Check a voter's answer to its outstanding challenge.
 *
 * `u` must echo the commitment stored with the ballot; otherwise the proof
 * fails without evaluating the equation.
 *
 * @throws {ProtocolViolation} If no challenge is outstanding for the voter
 */
export function recordProofResponse(
  state: SessionState,
  voterId: string,
  submission: ProofSubmission
): VerificationEntry {
  const outstanding = state.challenges.get(voterId);
  const vote = state.votes.get(voterId);
  const publicKey = state.publicKey;

  if (
    state.phase !== SessionPhase.VERIFYING ||
    !outstanding ||
    !vote ||
    publicKey === null
  ) {
    throw new ProtocolViolation(
      `No outstanding challenge for voter ${voterId}`,
      'NO_OUTSTANDING_CHALLENGE',
      { voterId, phase: state.phase }
    );
  }

  state.challenges.delete(voterId);

  const valid =
    submission.u === vote.commitment.a &&
    verify(
      vote.commitment,
      { v: submission.v, w: submission.w },
      outstanding.challenge,
      vote.ciphertext,
      publicKey
    );

  return recordVerification(state, voterId, valid ? 'verified' : 'failed');
}

/**
 * Drop an outstanding challenge that will not be answered
 *
 * @returns The recorded entry, or null if nothing was outstanding
 */
export function expireChallenge(
  state: SessionState,
  voterId: string,
  reason: 'timeout' | 'withdrawn'
): VerificationEntry | null {
  if (!state.challenges.delete(voterId)) {
    return null;
  }
  return recordVerification(state, voterId, reason);
}

/**
 * True once every issued challenge has been resolved
 */
export function isVerificationComplete(state: SessionState): boolean {
  return state.phase === SessionPhase.VERIFYING && state.challenges.size === 0;
}

/**
 * Assemble the report in ballot order. Ballots without a verdict count as withdrawn.
 */
export function buildReport(state: SessionState): VerificationReport {
  const results = Array.from(
    state.votes.keys(),
    (voterId): VerificationEntry =>
      state.verifications.get(voterId) ?? { voterId, valid: false, outcome: 'withdrawn' }
  );

  const validCount = results.filter((entry) => entry.valid).length;

  return {
    sessionId: state.config.id,
    tally: state.tally ? { ...state.tally } : null,
    results,
    validCount,
    fraudDetected: validCount < results.length,
    completedAt: new Date(),
  };
}
