/**
 * Session Status API
 *
 * Fastify app exposing the running election over HTTP
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { VotingServer } from '../server/voting-server.js';
import { ApiError, createApiKeyAuth, errorHandler } from './middleware/index.js';
import { API_VERSION, healthRoutes, sessionRoutes } from './routes/index.js';

export interface StatusServerConfig {
  /** Voting server whose session is exposed */
  votingServer: VotingServer;

  /** Port to listen on */
  port?: number;

  /** Host to bind to */
  host?: string;

  /** Enable CORS */
  enableCors?: boolean;

  /** Enable rate limiting */
  enableRateLimit?: boolean;

  /** Require the operator key on mutating requests */
  enableAuth?: boolean;

  /** Operator key; mutating requests are refused without one */
  apiKey?: string;

  /** Fastify logger configuration */
  logger?: FastifyServerOptions['logger'];
}

/**
 * Create and configure the Fastify app
 */
export async function createStatusServer(config: StatusServerConfig): Promise<FastifyInstance> {
  const {
    votingServer,
    enableCors = true,
    enableRateLimit = true,
    enableAuth = true,
    apiKey,
    logger = true,
  } = config;

  const fastify = Fastify({
    logger,
    ajv: {
      customOptions: {
        removeAdditional: 'all',
        coerceTypes: true,
        useDefaults: true,
      },
    },
  });

  fastify.setErrorHandler(errorHandler);

  if (enableCors) {
    await fastify.register(cors, {
      origin: true,
      credentials: true,
    });
  }

  if (enableRateLimit) {
    await fastify.register(rateLimit, {
      max: 100,
      timeWindow: '1 minute',
      errorResponseBuilder: () =>
        new ApiError(429, 'Rate limit exceeded. Please try again later.', 'RATE_LIMIT_EXCEEDED'),
    });
  }

  if (enableAuth) {
    fastify.addHook('onRequest', createApiKeyAuth(apiKey));
  }

  await fastify.register(healthRoutes, { votingServer });
  await fastify.register(sessionRoutes, { votingServer });

  fastify.get('/', async (_request, reply) => {
    reply.send({
      name: 'Paillier Ballot Status API',
      version: API_VERSION,
      description: 'Session status for the homomorphic YES/NO vote',
      endpoints: {
        health: 'GET /health',
        session: {
          status: 'GET /v1/session',
          report: 'GET /v1/session/report',
          audit: 'GET /v1/session/audit',
          tally: 'POST /v1/session/tally',
        },
      },
      documentation: 'Use X-API-Key header for POST requests',
    });
  });

  return fastify;
}

/**
 * Create the app and start listening
 */
export async function startStatusServer(config: StatusServerConfig): Promise<FastifyInstance> {
  const { port = 8889, host = '127.0.0.1' } = config;

  const fastify = await createStatusServer(config);
  await fastify.listen({ port, host });
  return fastify;
}
