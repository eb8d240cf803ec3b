/**
 * API Types for the session status API
 *
 * Query schemas and response shapes for the status endpoints. Big integers
 * cross the HTTP boundary as decimal strings.
 */

import { z } from 'zod';
import type { TallyOutcome } from '../paillier/types.js';
import type { AuditEntry, VerificationEntry } from '../session/types.js';

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * Query for the audit log endpoint
 */
export const AuditQuerySchema = z.object({
  /** Only the most recent entries */
  limit: z.coerce.number().int().positive().max(10_000).optional(),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;

// =============================================================================
// Response Types
// =============================================================================

export interface TallyResponse {
  encryptedSum: string;
  voteCount: number;
  result?: string;
  outcome?: TallyOutcome;
}

export interface ReportResponse {
  sessionId: string;
  tally: TallyResponse | null;
  results: VerificationEntry[];
  validCount: number;
  fraudDetected: boolean;
  completedAt: string;
}

export interface AuditResponse {
  sessionId: string;
  valid: boolean;
  total: number;
  entries: AuditEntry[];
}

export interface TallyStartedResponse {
  encryptedSum: string;
  voteCount: number;
}

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  listening: boolean;
}

export interface ErrorResponse {
  error: {
    message: string;
    code?: string;
    statusCode: number;
  };
}
