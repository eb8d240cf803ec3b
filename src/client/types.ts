/**
 * Voter Client Type Definitions
 */

import type { Logger } from '../logger.js';
import type { PaillierKeyConfig, TallyOutcome } from '../paillier/types.js';

/**
 * Connecting → RoleNegotiation → (KeyHolder | Voter) → Voting →
 * AwaitingChallenge → Responding → Closed, with ResultDecryption
 * entered by the key holder only.
 */
export enum ClientState {
  CONNECTING = 'CONNECTING',
  ROLE_NEGOTIATION = 'ROLE_NEGOTIATION',
  KEY_HOLDER = 'KEY_HOLDER',
  VOTER = 'VOTER',
  VOTING = 'VOTING',
  AWAITING_CHALLENGE = 'AWAITING_CHALLENGE',
  RESPONDING = 'RESPONDING',
  RESULT_DECRYPTION = 'RESULT_DECRYPTION',
  CLOSED = 'CLOSED',
}

export type VoteChoice = 'yes' | 'no';

export interface VoterClientOptions {
  host?: string;

  port?: number;

  /** Key generation parameters, used only if this client becomes key holder */
  keyConfig?: PaillierKeyConfig;

  /** Bounded wait for each reply during the handshake, ballot and tally */
  timeoutMs?: number;

  /**
   * Wait for the challenge and the final verdict, which arrive only once
   * someone starts the tally. Unbounded when omitted.
   */
  challengeTimeoutMs?: number;

  maxMessageBytes?: number;

  /** Answer the challenge for the opposite vote (fraud simulation) */
  forgeProof?: boolean;

  logger?: Logger;
}

/**
 * Outcome of the handshake
 */
export interface ClientRole {
  voterId: string;
  isKeyHolder: boolean;
}

/**
 * Decrypted tally, known to the key holder only
 */
export interface TallyResult {
  tally: bigint;
  outcome: TallyOutcome;
  voteCount: number;
}
