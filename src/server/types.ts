/**
 * Voting Server Type Definitions
 */

import type { Logger } from '../logger.js';
import type { VerificationReport } from '../session/types.js';

export interface VotingServerOptions {
  /** Host to bind to */
  host?: string;

  /** Port to listen on; 0 picks a free port */
  port?: number;

  /** Session identifier; random when omitted */
  sessionId?: string;

  /** Bounded wait for the key holder's public key */
  keyHolderTimeoutMs?: number;

  /** Bounded wait before a voter is handed the shared key */
  keyDistributionTimeoutMs?: number;

  /** Bounded wait for each proof response */
  responseTimeoutMs?: number;

  maxVoters?: number;

  maxMessageBytes?: number;

  /** Shut down once the verification report is ready (default true) */
  closeOnReport?: boolean;

  logger?: Logger;
}

export type ServerReportListener = (report: VerificationReport) => void;
