/**
 * Simulation Type Definitions
 */

import type { Logger } from '../logger.js';
import type { PaillierKeyConfig, PaillierKeyPair, TallyOutcome } from '../paillier/types.js';
import type { VerificationEntry } from '../session/types.js';
import type { VoteChoice } from '../client/types.js';

/** Voter name and ballot, in casting order */
export type SimulatedVote = readonly [voterId: string, choice: VoteChoice];

export interface SimulationOptions {
  /** Voters that answer their challenge for the opposite vote; unknown ids are ignored */
  fraudulentVoters?: Iterable<string>;

  /** Fixed key pair for the kiosk; generated from `keyConfig` otherwise */
  keyPair?: PaillierKeyPair;

  keyConfig?: PaillierKeyConfig;

  sessionId?: string;

  logger?: Logger;
}

export interface SimulationResult {
  sessionId: string;

  /** Decrypted signed sum of the ballots */
  tally: bigint;

  outcome: TallyOutcome;

  voteCount: number;

  /** One entry per ballot, in casting order */
  verifications: VerificationEntry[];

  validCount: number;

  fraudDetected: boolean;

  /** Integrity of the session's audit chain at the end of the run */
  auditLogValid: boolean;
}
