/**
 * Voter Registry
 *
 * Identifier assignment, key-holder designation and withdrawal
 */

import { SessionError } from '../errors.js';
import { randomBigInt } from '../utils/mod-arithmetic.js';
import { addAuditEntry, isRegistrationOpen, transitionPhase } from './state-machine.js';
import {
  SessionEventType,
  SessionPhase,
  VoterStatus,
  type RegistrationSummary,
  type SessionState,
  type Voter,
} from './types.js';

/** Identifiers are drawn from C1000..C9999 */
const ID_MIN = 1000n;
const ID_MAX = 10000n;

/** Size of the identifier namespace */
export const VOTER_ID_CAPACITY = Number(ID_MAX - ID_MIN);

/**
 * Draw an identifier not yet handed out in this session.
 *
 * Drawing at random keeps connection order from showing in the identifier.
 *
 * @throws {SessionError} If the namespace is exhausted
 */
export function generateVoterId(state: SessionState): string {
  if (state.usedIds.size >= VOTER_ID_CAPACITY) {
    throw new SessionError('Voter identifier namespace exhausted', 'SESSION_FULL', {
      capacity: VOTER_ID_CAPACITY,
    });
  }

  while (true) {
    const candidate = `C${randomBigInt(ID_MIN, ID_MAX)}`;
    if (!state.usedIds.has(candidate)) {
      return candidate;
    }
  }
}

/**
 * Register a voter. The first registrant becomes the key holder.
 *
 * @param voterId - Explicit identity; drawn at random when omitted
 * @throws {SessionError} If the session has ended, is full, or the identity is taken
 */
export function registerVoter(state: SessionState, voterId?: string): Voter {
  if (!isRegistrationOpen(state)) {
    throw new SessionError('Voting session has ended', 'SESSION_ENDED', {
      phase: state.phase,
    });
  }

  if (state.voters.size >= state.config.maxVoters) {
    throw new SessionError(
      `Session is full: ${state.config.maxVoters} voters already registered`,
      'SESSION_FULL',
      { maxVoters: state.config.maxVoters }
    );
  }

  if (voterId !== undefined) {
    if (voterId.trim().length === 0) {
      throw new SessionError('Voter ID cannot be empty', 'INVALID_VOTER_ID');
    }
    if (state.usedIds.has(voterId)) {
      throw new SessionError(`Voter ${voterId} is already registered`, 'DUPLICATE_VOTER', {
        voterId,
      });
    }
  }

  const id = voterId ?? generateVoterId(state);
  const isKeyHolder = state.keyHolderId === null;

  const voter: Voter = {
    id,
    isKeyHolder,
    status: VoterStatus.REGISTERED,
    registeredAt: new Date(),
  };

  state.voters.set(id, voter);
  state.usedIds.add(id);
  state.updatedAt = new Date();

  addAuditEntry(state, SessionEventType.VOTER_REGISTERED, {
    voterId: id,
    registeredCount: state.voters.size,
  });

  if (isKeyHolder) {
    state.keyHolderId = id;
    addAuditEntry(state, SessionEventType.KEY_HOLDER_DESIGNATED, { voterId: id });
    transitionPhase(state, SessionPhase.KEY_DISTRIBUTION);
  }

  return voter;
}

/**
 * Mark a voter as gone. A ballot already recorded stays in the tally.
 *
 * Voters with a final verification verdict keep it.
 *
 * @returns The voter, or undefined if unknown
 */
export function withdrawVoter(state: SessionState, voterId: string): Voter | undefined {
  const voter = state.voters.get(voterId);
  if (!voter) {
    return undefined;
  }

  if (
    voter.status === VoterStatus.WITHDRAWN ||
    voter.status === VoterStatus.VERIFIED ||
    voter.status === VoterStatus.FRAUD
  ) {
    return voter;
  }

  voter.status = VoterStatus.WITHDRAWN;
  state.updatedAt = new Date();

  addAuditEntry(state, SessionEventType.VOTER_WITHDRAWN, {
    voterId,
    hadVoted: state.votes.has(voterId),
  });

  return voter;
}

/**
 * True if the key holder left before publishing its key
 */
export function isKeyHolderLost(state: SessionState): boolean {
  if (state.keyHolderId === null || state.publicKey !== null) {
    return false;
  }
  return state.voters.get(state.keyHolderId)?.status === VoterStatus.WITHDRAWN;
}

export function getAllVoters(state: SessionState): Voter[] {
  return Array.from(state.voters.values());
}

export function getRegistrationSummary(state: SessionState): RegistrationSummary {
  let withdrawn = 0;
  for (const voter of state.voters.values()) {
    if (voter.status === VoterStatus.WITHDRAWN) withdrawn++;
  }

  return {
    registered: state.voters.size,
    active: state.voters.size - withdrawn,
    withdrawn,
    voted: state.votes.size,
    maxVoters: state.config.maxVoters,
  };
}
