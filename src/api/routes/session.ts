/**
 * Session Routes
 *
 * Read-only views of the election plus the operator's tally trigger
 */

import type { FastifyInstance } from 'fastify';
import type { VotingServer } from '../../server/voting-server.js';
import type { SessionStatus, TallyRecord, VerificationReport } from '../../session/types.js';
import { notFound } from '../middleware/error-handler.js';
import {
  AuditQuerySchema,
  type AuditResponse,
  type ReportResponse,
  type TallyResponse,
  type TallyStartedResponse,
} from '../types.js';

export interface SessionRouteOptions {
  votingServer: VotingServer;
}

function toTallyResponse(tally: TallyRecord): TallyResponse {
  return {
    encryptedSum: tally.encryptedSum.toString(),
    voteCount: tally.voteCount,
    result: tally.result?.toString(),
    outcome: tally.outcome,
  };
}

function toReportResponse(report: VerificationReport): ReportResponse {
  return {
    sessionId: report.sessionId,
    tally: report.tally ? toTallyResponse(report.tally) : null,
    results: report.results,
    validCount: report.validCount,
    fraudDetected: report.fraudDetected,
    completedAt: report.completedAt.toISOString(),
  };
}

export async function sessionRoutes(
  fastify: FastifyInstance,
  options: SessionRouteOptions
): Promise<void> {
  const coordinator = options.votingServer.getCoordinator();

  /**
   * GET /v1/session
   */
  fastify.get<{
    Reply: SessionStatus;
  }>('/v1/session', {
    schema: {
      description: 'Current phase, registration counts and tally state',
      tags: ['session'],
    },
  }, async (_request, reply) => {
    reply.send(coordinator.getStatus());
  });

  /**
   * GET /v1/session/report
   * 404 until the proof round has completed
   */
  fastify.get<{
    Reply: ReportResponse;
  }>('/v1/session/report', {
    schema: {
      description: 'Verification report of the finished election',
      tags: ['session'],
    },
  }, async (_request, reply) => {
    const report = coordinator.getReport();
    if (!report) {
      throw notFound('Verification report', coordinator.getSessionId());
    }

    reply.send(toReportResponse(report));
  });

  /**
   * GET /v1/session/audit
   */
  fastify.get<{
    Querystring: unknown;
    Reply: AuditResponse;
  }>('/v1/session/audit', {
    schema: {
      description: 'Hash-chained audit log and its integrity',
      tags: ['session'],
    },
  }, async (request, reply) => {
    const { limit } = AuditQuerySchema.parse(request.query);
    const log = coordinator.getAuditLog();

    reply.send({
      sessionId: coordinator.getSessionId(),
      valid: coordinator.verifyAuditLog(),
      total: log.length,
      entries: limit !== undefined ? log.slice(-limit) : log,
    });
  });

  /**
   * POST /v1/session/tally
   * Operator trigger: compute the sum and start the proof round
   */
  fastify.post<{
    Reply: TallyStartedResponse;
  }>('/v1/session/tally', {
    schema: {
      description: 'Close voting and start the tally',
      tags: ['session'],
    },
  }, async (_request, reply) => {
    const tally = options.votingServer.startTally();

    fastify.log.info({ voteCount: tally.voteCount }, 'tally started by operator');

    reply.send({
      encryptedSum: tally.encryptedSum.toString(),
      voteCount: tally.voteCount,
    });
  });
}
