/**
 * Ballot Collection
 *
 * One ciphertext per voter, stored with the Sigma commitment that the later
 * proof round is checked against.
 */

import { ProtocolViolation, SessionError } from '../errors.js';
import { addCiphertexts, isValidCiphertext } from '../paillier/index.js';
import type { SigmaCommitment } from '../sigma/types.js';
import { addAuditEntry, isAtOrAfter } from './state-machine.js';
import {
  SessionEventType,
  SessionPhase,
  VoterStatus,
  type SessionState,
  type TallyRecord,
  type VoteRecord,
} from './types.js';

/**
 * Store a voter's ballot
 *
 * @throws {ProtocolViolation} If the ballot is out of phase, from an unknown voter, or malformed
 * @throws {SessionError} If the voter has already voted
 */
export function recordVote(
  state: SessionState,
  voterId: string,
  ciphertext: bigint,
  commitment: SigmaCommitment
): VoteRecord {
  if (isAtOrAfter(state.phase, SessionPhase.TALLYING)) {
    throw new ProtocolViolation('Voting is closed', 'VOTING_CLOSED', { phase: state.phase });
  }

  const publicKey = state.publicKey;
  if (state.phase !== SessionPhase.COLLECTING || publicKey === null) {
    throw new ProtocolViolation('No shared public key yet', 'VOTE_OUT_OF_PHASE', {
      phase: state.phase,
    });
  }

  const voter = state.voters.get(voterId);
  if (!voter || voter.status === VoterStatus.WITHDRAWN) {
    throw new ProtocolViolation(`Unknown voter ${voterId}`, 'UNKNOWN_VOTER', { voterId });
  }

  if (state.votes.has(voterId)) {
    throw new SessionError(`Voter ${voterId} has already voted`, 'DUPLICATE_VOTE', { voterId });
  }

  if (!isValidCiphertext(ciphertext, publicKey)) {
    throw new ProtocolViolation('Ciphertext is not a unit mod n²', 'INVALID_CIPHERTEXT', {
      voterId,
    });
  }

  if (!isValidCiphertext(commitment.a, publicKey)) {
    throw new ProtocolViolation('Commitment is not a unit mod n²', 'INVALID_COMMITMENT', {
      voterId,
    });
  }

  const record: VoteRecord = {
    voterId,
    ciphertext,
    commitment: { a: commitment.a },
    recordedAt: new Date(),
  };

  state.votes.set(voterId, record);
  voter.status = VoterStatus.VOTED;
  state.updatedAt = new Date();

  addAuditEntry(state, SessionEventType.VOTE_RECORDED, {
    voterId,
    ciphertext: ciphertext.toString(),
    commitment: commitment.a.toString(),
    voteCount: state.votes.size,
  });

  return record;
}

/**
 * Homomorphic sum over every recorded ballot
 *
 * @throws {SessionError} If no public key has been published
 */
export function computeEncryptedSum(state: SessionState): TallyRecord {
  if (state.publicKey === null) {
    throw new SessionError('No public key available for tallying', 'NO_PUBLIC_KEY');
  }

  const ciphertexts = Array.from(state.votes.values(), (vote) => vote.ciphertext);

  return {
    encryptedSum: addCiphertexts(ciphertexts, state.publicKey),
    voteCount: ciphertexts.length,
    computedAt: new Date(),
  };
}

export function getAllVotes(state: SessionState): VoteRecord[] {
  return Array.from(state.votes.values());
}
