/**
 * Session Coordinator
 *
 * Single owner of the election state. Every mutation is a synchronous method,
 * so concurrent connection handlers are serialized by the event loop and the
 * cross-cutting invariants (one ballot per voter, forward-only phases) hold
 * at this one point.
 */

import { bytesToHex, randomBytes } from '@noble/hashes/utils';
import { ProtocolTimeout, ProtocolViolation, SessionError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { classifyTally } from '../paillier/index.js';
import type { PaillierPublicKey } from '../paillier/types.js';
import type { SigmaCommitment } from '../sigma/types.js';
import { computeEncryptedSum, recordVote } from './ballots.js';
import {
  buildReport,
  expireChallenge,
  isVerificationComplete,
  issueChallenges,
  recordProofResponse,
} from './challenges.js';
import {
  getAllVoters,
  getRegistrationSummary,
  isKeyHolderLost,
  registerVoter,
  VOTER_ID_CAPACITY,
  withdrawVoter,
} from './registry.js';
import {
  addAuditEntry,
  getNextPhase,
  getPhaseDescription,
  isAtOrAfter,
  transitionPhase,
  verifyAuditLog,
} from './state-machine.js';
import {
  SessionEventType,
  SessionPhase,
  type AuditEntry,
  type IssuedChallenge,
  type ProofSubmission,
  type SessionState,
  type SessionStatus,
  type TallyRecord,
  type VerificationEntry,
  type VerificationReport,
  type Voter,
  type VoteRecord,
} from './types.js';

export interface SessionCoordinatorOptions {
  /** Session identifier; random when omitted */
  id?: string;

  /** Registration cap, at most the identifier namespace */
  maxVoters?: number;

  description?: string;

  logger?: Logger;
}

export type ReportListener = (report: VerificationReport) => void;

interface KeyWaiter {
  resolve: (key: PaillierPublicKey) => void;
  reject: (err: Error) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Session Coordinator
 *
 * @example
 * ```typescript
 * const session = new SessionCoordinator({ maxVoters: 100 });
 *
 * const holder = session.registerVoter();        // key holder
 * session.publishPublicKey(holder.id, keyPair.publicKey);
 *
 * const voter = session.registerVoter();
 * session.recordVote(voter.id, ciphertext, commitment);
 *
 * const tally = session.beginTally();            // forward tally.encryptedSum to the key holder
 * const challenges = session.issueChallenges();  // send each to its voter
 * session.recordProofResponse(voter.id, { u, v, w });
 * ```
 */
export class SessionCoordinator {
  private readonly state: SessionState;
  private readonly logger: Logger;
  private keyWaiters: KeyWaiter[] = [];
  private readonly reportListeners = new Set<ReportListener>();

  constructor(options: SessionCoordinatorOptions = {}) {
    const maxVoters = options.maxVoters ?? VOTER_ID_CAPACITY;
    if (!Number.isInteger(maxVoters) || maxVoters < 1 || maxVoters > VOTER_ID_CAPACITY) {
      throw new SessionError(
        `maxVoters must be an integer between 1 and ${VOTER_ID_CAPACITY}`,
        'INVALID_CONFIG',
        { maxVoters }
      );
    }

    const id = options.id ?? `session-${bytesToHex(randomBytes(8))}`;
    if (id.trim().length === 0) {
      throw new SessionError('Session ID cannot be empty', 'INVALID_CONFIG');
    }

    this.logger = (options.logger ?? silentLogger()).child({ sessionId: id });

    this.state = {
      config: { id, maxVoters, description: options.description },
      phase: SessionPhase.REGISTERING,
      voters: new Map(),
      usedIds: new Set(),
      keyHolderId: null,
      publicKey: null,
      votes: new Map(),
      tally: null,
      challenges: new Map(),
      verifications: new Map(),
      report: null,
      auditLog: [],
      createdAt: new Date(),
      updatedAt: new Date(),
    };

    addAuditEntry(this.state, SessionEventType.SESSION_CREATED, {
      id,
      maxVoters,
      description: options.description,
    });
  }

  // ===========================================================================
  // Registration & Key Distribution
  // ===========================================================================

  /**
   * Register a voter. The first registrant is designated key holder.
   *
   * @throws {SessionError} SESSION_ENDED, SESSION_FULL or DUPLICATE_VOTER
   */
  registerVoter(voterId?: string): Voter {
    const voter = registerVoter(this.state, voterId);
    this.logger.info(
      { voterId: voter.id, keyHolder: voter.isKeyHolder, registered: this.state.voters.size },
      'voter registered'
    );
    return { ...voter };
  }

  /**
   * Store the key holder's public key and open ballot collection
   *
   * @throws {ProtocolViolation} If the sender is not the key holder or a key is already set
   */
  publishPublicKey(voterId: string, publicKey: PaillierPublicKey): void {
    if (voterId !== this.state.keyHolderId) {
      throw new ProtocolViolation('Only the key holder may publish the public key', 'NOT_KEY_HOLDER', {
        voterId,
      });
    }
    if (this.state.phase !== SessionPhase.KEY_DISTRIBUTION) {
      throw new ProtocolViolation('Public key already published', 'PUBLIC_KEY_ALREADY_SET', {
        phase: this.state.phase,
      });
    }

    this.state.publicKey = { g: publicKey.g, n: publicKey.n };
    addAuditEntry(this.state, SessionEventType.PUBLIC_KEY_PUBLISHED, {
      voterId,
      g: publicKey.g.toString(),
      n: publicKey.n.toString(),
    });
    transitionPhase(this.state, SessionPhase.COLLECTING);

    this.logger.info({ voterId, n: publicKey.n.toString() }, 'public key published');

    const shared = this.state.publicKey;
    for (const waiter of this.takeKeyWaiters()) {
      waiter.resolve(shared);
    }
  }

  /**
   * Resolve with the shared public key once published.
   *
   * @throws {ProtocolTimeout} If nothing is published within `timeoutMs`
   * @throws {SessionError} KEY_HOLDER_WITHDRAWN or SESSION_CLOSED
   */
  whenPublicKey(timeoutMs?: number): Promise<PaillierPublicKey> {
    if (this.state.publicKey !== null) {
      return Promise.resolve(this.state.publicKey);
    }
    const refusal = this.keyRefusal();
    if (refusal) {
      return Promise.reject(refusal);
    }

    return new Promise<PaillierPublicKey>((resolve, reject) => {
      const waiter: KeyWaiter = { resolve, reject };

      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.keyWaiters = this.keyWaiters.filter((w) => w !== waiter);
          reject(
            new ProtocolTimeout(`No public key published within ${timeoutMs}ms`, { timeoutMs })
          );
        }, timeoutMs);
      }

      this.keyWaiters.push(waiter);
    });
  }

  getPublicKey(): PaillierPublicKey | null {
    return this.state.publicKey;
  }

  getKeyHolderId(): string | null {
    return this.state.keyHolderId;
  }

  // ===========================================================================
  // Ballots & Tally
  // ===========================================================================

  /**
   * @throws {ProtocolViolation} If the ballot is out of phase or malformed
   * @throws {SessionError} DUPLICATE_VOTE
   */
  recordVote(voterId: string, ciphertext: bigint, commitment: SigmaCommitment): VoteRecord {
    const record = recordVote(this.state, voterId, ciphertext, commitment);
    this.logger.info({ voterId, voteCount: this.state.votes.size }, 'vote recorded');
    return record;
  }

  /**
   * Close ballot collection and compute the homomorphic sum.
   *
   * A refusal leaves the phase unchanged.
   *
   * @throws {SessionError} NO_PUBLIC_KEY, TALLY_ALREADY_STARTED or SESSION_ENDED
   */
  beginTally(): TallyRecord {
    const { phase } = this.state;

    if (phase === SessionPhase.CLOSED) {
      throw new SessionError('Voting session has ended', 'SESSION_ENDED', { phase });
    }
    if (isAtOrAfter(phase, SessionPhase.TALLYING)) {
      throw new SessionError('Tally already started', 'TALLY_ALREADY_STARTED', { phase });
    }
    if (phase !== SessionPhase.COLLECTING || this.state.publicKey === null) {
      throw new SessionError('No public key available for tallying', 'NO_PUBLIC_KEY', { phase });
    }

    const tally = computeEncryptedSum(this.state);
    transitionPhase(this.state, SessionPhase.TALLYING);

    this.state.tally = tally;
    addAuditEntry(this.state, SessionEventType.TALLY_COMPUTED, {
      encryptedSum: tally.encryptedSum.toString(),
      voteCount: tally.voteCount,
    });

    this.logger.info({ voteCount: tally.voteCount }, 'tally computed');
    return { ...tally };
  }

  /**
   * Store the key holder's decryption of the tally
   *
   * @throws {ProtocolViolation} NOT_KEY_HOLDER, TALLY_NOT_STARTED or TALLY_ALREADY_REPORTED
   */
  recordTallyResult(voterId: string, result: bigint): TallyRecord {
    if (voterId !== this.state.keyHolderId) {
      throw new ProtocolViolation('Only the key holder may report the tally', 'NOT_KEY_HOLDER', {
        voterId,
      });
    }

    const tally = this.state.tally;
    if (tally === null || !isAtOrAfter(this.state.phase, SessionPhase.TALLYING)) {
      throw new ProtocolViolation('No tally has been computed', 'TALLY_NOT_STARTED', {
        phase: this.state.phase,
      });
    }
    if (tally.result !== undefined) {
      throw new ProtocolViolation('Tally already reported', 'TALLY_ALREADY_REPORTED');
    }

    tally.result = result;
    tally.outcome = classifyTally(result);
    this.state.updatedAt = new Date();

    addAuditEntry(this.state, SessionEventType.TALLY_REPORTED, {
      voterId,
      result: result.toString(),
      outcome: tally.outcome,
    });

    if (this.state.report) {
      this.state.report.tally = { ...tally };
    }

    this.logger.info({ result: result.toString(), outcome: tally.outcome }, 'tally reported');
    return { ...tally };
  }

  getTally(): TallyRecord | null {
    return this.state.tally ? { ...this.state.tally } : null;
  }

  // ===========================================================================
  // Proof Round
  // ===========================================================================

  /**
   * Issue one fresh challenge per ballot.
   *
   * If nothing ends up outstanding the session closes immediately.
   *
   * @param isReachable - Whether a voter can still receive its challenge
   */
  issueChallenges(isReachable: (voterId: string) => boolean = () => true): IssuedChallenge[] {
    const issued = issueChallenges(this.state, isReachable);
    this.logger.info(
      { issued: issued.length, ballots: this.state.votes.size },
      'challenges issued'
    );
    this.completeIfDone();
    return issued;
  }

  /**
   * @throws {ProtocolViolation} NO_OUTSTANDING_CHALLENGE
   */
  recordProofResponse(voterId: string, submission: ProofSubmission): VerificationEntry {
    const entry = recordProofResponse(this.state, voterId, submission);
    if (entry.valid) {
      this.logger.info({ voterId }, 'proof verified');
    } else {
      this.logger.warn({ voterId }, 'proof failed: fraud detected');
    }
    this.completeIfDone();
    return { ...entry };
  }

  /**
   * Resolve an outstanding challenge as unanswered
   */
  expireChallenge(voterId: string, reason: 'timeout' | 'withdrawn'): VerificationEntry | null {
    const entry = expireChallenge(this.state, voterId, reason);
    if (entry) {
      this.logger.warn({ voterId, reason }, 'challenge expired');
      this.completeIfDone();
    }
    return entry;
  }

  getOutstandingChallenges(): string[] {
    return Array.from(this.state.challenges.keys());
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * A connection went away. Its ballot, if any, stays in the tally.
   */
  withdrawVoter(voterId: string): void {
    const voter = withdrawVoter(this.state, voterId);
    if (!voter) {
      return;
    }

    this.logger.info({ voterId, phase: this.state.phase }, 'voter withdrawn');

    if (this.state.challenges.has(voterId)) {
      this.expireChallenge(voterId, 'withdrawn');
    }

    if (isKeyHolderLost(this.state)) {
      const refusal = this.keyRefusal();
      for (const waiter of this.takeKeyWaiters()) {
        waiter.reject(refusal ?? new SessionError('Key holder withdrawn', 'KEY_HOLDER_WITHDRAWN'));
      }
    }
  }

  /**
   * Move to CLOSED. Outstanding challenges count as withdrawn.
   * Idempotent.
   *
   * @returns The verification report if a tally was computed
   */
  close(reason = 'shutdown'): VerificationReport | null {
    if (this.state.phase === SessionPhase.CLOSED) {
      return this.state.report;
    }

    for (const voterId of Array.from(this.state.challenges.keys())) {
      expireChallenge(this.state, voterId, 'withdrawn');
    }

    this.finish(reason);
    return this.state.report;
  }

  /**
   * Drop the voter registry. The report and audit log are kept.
   */
  clear(): void {
    this.state.voters.clear();
    this.state.votes.clear();
    this.state.challenges.clear();
    this.state.updatedAt = new Date();
  }

  /**
   * Subscribe to the final report
   *
   * @returns Unsubscribe function
   */
  onReport(listener: ReportListener): () => void {
    this.reportListeners.add(listener);
    return () => {
      this.reportListeners.delete(listener);
    };
  }

  getReport(): VerificationReport | null {
    return this.state.report;
  }

  isClosed(): boolean {
    return this.state.phase === SessionPhase.CLOSED;
  }

  // ===========================================================================
  // Status & Monitoring
  // ===========================================================================

  getSessionId(): string {
    return this.state.config.id;
  }

  getPhase(): SessionPhase {
    return this.state.phase;
  }

  getVoter(voterId: string): Voter | undefined {
    const voter = this.state.voters.get(voterId);
    return voter ? { ...voter } : undefined;
  }

  getVoters(): Voter[] {
    return getAllVoters(this.state).map((voter) => ({ ...voter }));
  }

  getStatus(): SessionStatus {
    const { tally, report } = this.state;

    return {
      sessionId: this.state.config.id,
      phase: this.state.phase,
      description: getPhaseDescription(this.state.phase),
      nextPhase: getNextPhase(this.state.phase),
      voters: getRegistrationSummary(this.state),
      hasKeyHolder: this.state.keyHolderId !== null,
      hasPublicKey: this.state.publicKey !== null,
      outstandingChallenges: this.state.challenges.size,
      tally: tally
        ? {
            encryptedSum: tally.encryptedSum.toString(),
            voteCount: tally.voteCount,
            result: tally.result?.toString(),
            outcome: tally.outcome,
          }
        : null,
      fraudDetected: report ? report.fraudDetected : null,
      createdAt: this.state.createdAt,
      updatedAt: this.state.updatedAt,
    };
  }

  getAuditLog(): AuditEntry[] {
    return [...this.state.auditLog];
  }

  verifyAuditLog(): boolean {
    return verifyAuditLog(this.state.auditLog);
  }

  /**
   * Export state for persistence/debugging
   */
  exportState(): string {
    return JSON.stringify(
      {
        ...this.state,
        voters: Array.from(this.state.voters.entries()),
        usedIds: Array.from(this.state.usedIds),
        votes: Array.from(this.state.votes.entries()),
        challenges: Array.from(this.state.challenges.entries()),
        verifications: Array.from(this.state.verifications.entries()),
      },
      (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
      2
    );
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private keyRefusal(): SessionError | null {
    if (this.state.phase === SessionPhase.CLOSED) {
      return new SessionError('Voting session has ended', 'SESSION_CLOSED');
    }
    if (isKeyHolderLost(this.state)) {
      return new SessionError(
        'Key holder withdrew before publishing a public key',
        'KEY_HOLDER_WITHDRAWN',
        { keyHolderId: this.state.keyHolderId }
      );
    }
    return null;
  }

  private takeKeyWaiters(): KeyWaiter[] {
    const waiters = this.keyWaiters;
    this.keyWaiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
    }
    return waiters;
  }

  private completeIfDone(): void {
    if (isVerificationComplete(this.state)) {
      this.finish('verification complete');
    }
  }

  private finish(reason: string): void {
    if (this.state.tally !== null) {
      this.state.report = buildReport(this.state);
    }

    transitionPhase(this.state, SessionPhase.CLOSED, { reason });
    addAuditEntry(this.state, SessionEventType.SESSION_CLOSED, {
      reason,
      fraudDetected: this.state.report?.fraudDetected ?? null,
    });

    const refusal = new SessionError('Voting session has ended', 'SESSION_CLOSED');
    for (const waiter of this.takeKeyWaiters()) {
      waiter.reject(refusal);
    }

    const report = this.state.report;
    this.logger.info(
      {
        reason,
        validCount: report?.validCount,
        ballots: report?.results.length,
        fraudDetected: report?.fraudDetected,
      },
      'session closed'
    );

    if (report) {
      for (const listener of this.reportListeners) {
        try {
          listener(report);
        } catch (err) {
          this.logger.error({ err }, 'report listener failed');
        }
      }
    }
  }
}
