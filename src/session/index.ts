/**
 * Voting Session Module
 *
 * Server-side state of one election: registration, key distribution,
 * ballot collection, homomorphic tally and the proof round.
 *
 * @example
 * ```typescript
 * import { SessionCoordinator } from 'paillier-ballot';
 *
 * const session = new SessionCoordinator({ maxVoters: 50 });
 * const holder = session.registerVoter();
 * session.publishPublicKey(holder.id, publicKey);
 * ```
 */

// Main coordinator
export { SessionCoordinator } from './coordinator.js';
export type { SessionCoordinatorOptions, ReportListener } from './coordinator.js';

// Types
export type {
  SessionConfig,
  SessionState,
  SessionStatus,
  Voter,
  VoteRecord,
  OutstandingChallenge,
  IssuedChallenge,
  ProofSubmission,
  VerificationOutcome,
  VerificationEntry,
  VerificationReport,
  TallyRecord,
  RegistrationSummary,
  AuditEntry,
} from './types.js';

export { SessionPhase, VoterStatus, SessionEventType } from './types.js';

// State machine utilities (for advanced users)
export {
  transitionPhase,
  isValidTransition,
  isAtOrAfter,
  isRegistrationOpen,
  addAuditEntry,
  verifyAuditLog,
  getPhaseDescription,
  getNextPhase,
} from './state-machine.js';

export { VOTER_ID_CAPACITY, generateVoterId, getRegistrationSummary } from './registry.js';
export { computeEncryptedSum } from './ballots.js';
export { buildReport, isVerificationComplete } from './challenges.js';
