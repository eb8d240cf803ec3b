/**
 * Types for the Voting Session
 *
 * The server's view of one election: who is registered, which ciphertexts
 * were cast, the shared public key, outstanding proof challenges and the
 * verification outcome per voter.
 */

import type { PaillierPublicKey, TallyOutcome } from '../paillier/types.js';
import type { SigmaChallenge, SigmaCommitment } from '../sigma/types.js';

/**
 * Phases of a session. Strictly forward; CLOSED is reachable from any phase.
 */
export enum SessionPhase {
  /** Waiting for the first registrant */
  REGISTERING = 'REGISTERING',
  /** Key holder designated, waiting for its public key */
  KEY_DISTRIBUTION = 'KEY_DISTRIBUTION',
  /** Shared key published, accepting one ballot per voter */
  COLLECTING = 'COLLECTING',
  /** Homomorphic sum computed and forwarded for decryption */
  TALLYING = 'TALLYING',
  /** Issuing one challenge per ballot */
  CHALLENGING = 'CHALLENGING',
  /** Waiting for proof responses */
  VERIFYING = 'VERIFYING',
  /** Terminal */
  CLOSED = 'CLOSED',
}

/**
 * Configuration for a session
 */
export interface SessionConfig {
  /** Unique session identifier */
  id: string;

  /** Upper bound on registrations */
  maxVoters: number;

  /** Optional description */
  description?: string;
}

export enum VoterStatus {
  /** Registered, no ballot yet */
  REGISTERED = 'REGISTERED',
  /** Ballot recorded */
  VOTED = 'VOTED',
  /** Challenge outstanding */
  CHALLENGED = 'CHALLENGED',
  /** Proof accepted */
  VERIFIED = 'VERIFIED',
  /** Proof rejected */
  FRAUD = 'FRAUD',
  /** Connection gone */
  WITHDRAWN = 'WITHDRAWN',
}

/**
 * A registered voter
 */
export interface Voter {
  /** Server-assigned identifier, e.g. "C4821" */
  id: string;

  /** True for the single party holding the private key */
  isKeyHolder: boolean;

  status: VoterStatus;

  registeredAt: Date;
}

/**
 * One voter's ballot as stored by the server. Immutable once recorded.
 */
export interface VoteRecord {
  readonly voterId: string;

  /** Paillier ciphertext of +1 or -1 */
  readonly ciphertext: bigint;

  /** Sigma commitment fixed before any challenge is issued */
  readonly commitment: SigmaCommitment;

  readonly recordedAt: Date;
}

/**
 * A challenge waiting for its response
 */
export interface OutstandingChallenge {
  voterId: string;
  challenge: SigmaChallenge;
  issuedAt: Date;
}

/**
 * A response to a challenge. `u` echoes the stored commitment.
 */
export interface ProofSubmission {
  u: bigint;
  v: bigint;
  w: bigint;
}

export type VerificationOutcome = 'verified' | 'failed' | 'timeout' | 'withdrawn';

/**
 * Verification result for one voter. `valid: false` is the fraud flag.
 */
export interface VerificationEntry {
  voterId: string;
  valid: boolean;
  outcome: VerificationOutcome;
}

/**
 * The homomorphic tally and, once reported, its decryption
 */
export interface TallyRecord {
  encryptedSum: bigint;
  voteCount: number;
  computedAt: Date;

  /** Signed plaintext reported by the key holder */
  result?: bigint;
  outcome?: TallyOutcome;
}

/**
 * Final report of a verification round
 */
export interface VerificationReport {
  sessionId: string;
  tally: TallyRecord | null;
  results: VerificationEntry[];
  validCount: number;
  fraudDetected: boolean;
  completedAt: Date;
}

/**
 * Issued challenge handed to the transport
 */
export interface IssuedChallenge {
  voterId: string;
  challenge: SigmaChallenge;
}

export enum SessionEventType {
  SESSION_CREATED = 'SESSION_CREATED',
  PHASE_TRANSITION = 'PHASE_TRANSITION',
  VOTER_REGISTERED = 'VOTER_REGISTERED',
  KEY_HOLDER_DESIGNATED = 'KEY_HOLDER_DESIGNATED',
  PUBLIC_KEY_PUBLISHED = 'PUBLIC_KEY_PUBLISHED',
  VOTE_RECORDED = 'VOTE_RECORDED',
  VOTER_WITHDRAWN = 'VOTER_WITHDRAWN',
  TALLY_COMPUTED = 'TALLY_COMPUTED',
  TALLY_REPORTED = 'TALLY_REPORTED',
  CHALLENGE_ISSUED = 'CHALLENGE_ISSUED',
  PROOF_CHECKED = 'PROOF_CHECKED',
  SESSION_CLOSED = 'SESSION_CLOSED',
}

/**
 * An entry in the audit log
 * Hash-linked for tamper evidence
 */
export interface AuditEntry {
  /** Sequential entry number */
  sequence: number;

  eventType: SessionEventType;

  timestamp: Date;

  /** Event data (JSON-serializable) */
  data: Record<string, unknown>;

  /** Hash of previous entry (for chain integrity) */
  previousHash: string;

  /** Hash of this entry */
  hash: string;
}

/**
 * Complete state of a session
 */
export interface SessionState {
  config: SessionConfig;

  phase: SessionPhase;

  /** Registered voters by id */
  voters: Map<string, Voter>;

  /** Every identifier ever handed out, withdrawn ones included */
  usedIds: Set<string>;

  keyHolderId: string | null;

  publicKey: PaillierPublicKey | null;

  /** Ballots by voter id */
  votes: Map<string, VoteRecord>;

  tally: TallyRecord | null;

  challenges: Map<string, OutstandingChallenge>;

  verifications: Map<string, VerificationEntry>;

  report: VerificationReport | null;

  auditLog: AuditEntry[];

  createdAt: Date;

  updatedAt: Date;
}

/**
 * Registration counts
 */
export interface RegistrationSummary {
  registered: number;
  active: number;
  withdrawn: number;
  voted: number;
  maxVoters: number;
}

/**
 * Snapshot returned by the coordinator and the status API
 */
export interface SessionStatus {
  sessionId: string;
  phase: SessionPhase;
  description: string;
  nextPhase: SessionPhase | null;
  voters: RegistrationSummary;
  hasKeyHolder: boolean;
  hasPublicKey: boolean;
  outstandingChallenges: number;
  tally: {
    encryptedSum: string;
    voteCount: number;
    result?: string;
    outcome?: TallyOutcome;
  } | null;
  fraudDetected: boolean | null;
  createdAt: Date;
  updatedAt: Date;
}
