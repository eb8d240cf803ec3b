/**
 * Health Check Route
 *
 * Health check endpoint for monitoring and load balancers
 */

import type { FastifyInstance } from 'fastify';
import type { VotingServer } from '../../server/voting-server.js';
import type { HealthResponse } from '../types.js';

export const API_VERSION = '0.1.0';

export interface HealthRouteOptions {
  votingServer: VotingServer;
}

export async function healthRoutes(
  fastify: FastifyInstance,
  options: HealthRouteOptions
): Promise<void> {
  const { votingServer } = options;

  /**
   * GET /health
   * Healthy while the voting server accepts connections
   */
  fastify.get<{
    Reply: HealthResponse;
  }>('/health', {
    schema: {
      description: 'Health check endpoint',
      tags: ['health'],
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string' },
            version: { type: 'string' },
            listening: { type: 'boolean' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    const listening = votingServer.address() !== null;
    const response: HealthResponse = {
      status: listening ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
      listening,
    };

    reply.send(response);
  });
}
