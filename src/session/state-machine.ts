/**
 * Session State Machine
 *
 * Enforces forward-only phase progression:
 * REGISTERING → KEY_DISTRIBUTION → COLLECTING → TALLYING → CHALLENGING → VERIFYING → CLOSED
 *
 * Any phase may jump straight to CLOSED (shutdown).
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { SessionError } from '../errors.js';
import {
  SessionEventType,
  SessionPhase,
  type AuditEntry,
  type SessionState,
} from './types.js';

const PHASE_ORDER: readonly SessionPhase[] = [
  SessionPhase.REGISTERING,
  SessionPhase.KEY_DISTRIBUTION,
  SessionPhase.COLLECTING,
  SessionPhase.TALLYING,
  SessionPhase.CHALLENGING,
  SessionPhase.VERIFYING,
  SessionPhase.CLOSED,
];

/**
 * Valid phase transitions
 */
const VALID_TRANSITIONS: Record<SessionPhase, SessionPhase[]> = {
  [SessionPhase.REGISTERING]: [SessionPhase.KEY_DISTRIBUTION, SessionPhase.CLOSED],
  [SessionPhase.KEY_DISTRIBUTION]: [SessionPhase.COLLECTING, SessionPhase.CLOSED],
  [SessionPhase.COLLECTING]: [SessionPhase.TALLYING, SessionPhase.CLOSED],
  [SessionPhase.TALLYING]: [SessionPhase.CHALLENGING, SessionPhase.CLOSED],
  [SessionPhase.CHALLENGING]: [SessionPhase.VERIFYING, SessionPhase.CLOSED],
  [SessionPhase.VERIFYING]: [SessionPhase.CLOSED],
  [SessionPhase.CLOSED]: [], // Terminal state
};

const GENESIS_HASH = '0'.repeat(64);

/**
 * Check if a phase transition is valid
 */
export function isValidTransition(from: SessionPhase, to: SessionPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * True if `phase` is `reference` or comes after it
 */
export function isAtOrAfter(phase: SessionPhase, reference: SessionPhase): boolean {
  return PHASE_ORDER.indexOf(phase) >= PHASE_ORDER.indexOf(reference);
}

/**
 * True while new registrations are accepted
 */
export function isRegistrationOpen(state: SessionState): boolean {
  return !isAtOrAfter(state.phase, SessionPhase.TALLYING);
}

function getTransitionGuard(to: SessionPhase): ((state: SessionState) => boolean) | null {
  switch (to) {
    case SessionPhase.KEY_DISTRIBUTION:
      return (state) => state.keyHolderId !== null;
    case SessionPhase.COLLECTING:
    case SessionPhase.TALLYING:
      return (state) => state.publicKey !== null;
    case SessionPhase.CHALLENGING:
      return (state) => state.tally !== null;
    default:
      return null;
  }
}

/**
 * Move the session to a new phase
 *
 * @throws {SessionError} If the transition is invalid or its guard fails
 */
export function transitionPhase(
  state: SessionState,
  newPhase: SessionPhase,
  metadata: Record<string, unknown> = {}
): void {
  const currentPhase = state.phase;

  if (!isValidTransition(currentPhase, newPhase)) {
    throw new SessionError(
      `Invalid phase transition: ${currentPhase} → ${newPhase}`,
      'INVALID_TRANSITION',
      { from: currentPhase, to: newPhase }
    );
  }

  const guard = getTransitionGuard(newPhase);
  if (guard && !guard(state)) {
    throw new SessionError(
      `Cannot transition to ${newPhase}: guard conditions not met`,
      'GUARD_FAILED',
      {
        from: currentPhase,
        to: newPhase,
        hasKeyHolder: state.keyHolderId !== null,
        hasPublicKey: state.publicKey !== null,
        hasTally: state.tally !== null,
      }
    );
  }

  state.phase = newPhase;
  state.updatedAt = new Date();

  addAuditEntry(state, SessionEventType.PHASE_TRANSITION, {
    from: currentPhase,
    to: newPhase,
    ...metadata,
  });
}

function hashEntry(entry: Omit<AuditEntry, 'hash'>): string {
  const entryJson = JSON.stringify({
    sequence: entry.sequence,
    eventType: entry.eventType,
    timestamp: entry.timestamp.toISOString(),
    data: entry.data,
    previousHash: entry.previousHash,
  });
  return bytesToHex(sha256(utf8ToBytes(entryJson)));
}

/**
 * Add an entry to the audit log with hash chaining
 */
export function addAuditEntry(
  state: SessionState,
  eventType: SessionEventType,
  data: Record<string, unknown>
): AuditEntry {
  const sequence = state.auditLog.length;
  const previousHash = state.auditLog.at(-1)?.hash ?? GENESIS_HASH;

  const entry: Omit<AuditEntry, 'hash'> = {
    sequence,
    eventType,
    timestamp: new Date(),
    data,
    previousHash,
  };

  const fullEntry: AuditEntry = { ...entry, hash: hashEntry(entry) };
  state.auditLog.push(fullEntry);

  return fullEntry;
}

/**
 * Verify integrity of audit log hash chain
 */
export function verifyAuditLog(auditLog: readonly AuditEntry[]): boolean {
  let previousHash = GENESIS_HASH;

  for (const [i, entry] of auditLog.entries()) {
    if (entry.sequence !== i || entry.previousHash !== previousHash) {
      return false;
    }
    if (hashEntry(entry) !== entry.hash) {
      return false;
    }
    previousHash = entry.hash;
  }

  return true;
}

/**
 * Get human-readable description of a phase
 */
export function getPhaseDescription(phase: SessionPhase): string {
  switch (phase) {
    case SessionPhase.REGISTERING:
      return 'Waiting for the first voter to register';
    case SessionPhase.KEY_DISTRIBUTION:
      return 'Waiting for the key holder to publish its public key';
    case SessionPhase.COLLECTING:
      return 'Collecting encrypted ballots';
    case SessionPhase.TALLYING:
      return 'Computing the homomorphic tally';
    case SessionPhase.CHALLENGING:
      return 'Issuing proof challenges';
    case SessionPhase.VERIFYING:
      return 'Verifying proof responses';
    case SessionPhase.CLOSED:
      return 'Session closed';
  }
}

/**
 * Get next expected phase (ignoring the shutdown shortcut)
 */
export function getNextPhase(currentPhase: SessionPhase): SessionPhase | null {
  return VALID_TRANSITIONS[currentPhase].find((p) => p !== SessionPhase.CLOSED) ??
    (currentPhase === SessionPhase.VERIFYING ? SessionPhase.CLOSED : null);
}
