/**
 * API Key Authentication Middleware
 *
 * Read-only requests are open. Anything that changes the session needs the
 * operator key in the X-API-Key header; without a configured key such
 * requests are always refused.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { unauthorized } from './error-handler.js';

const OPEN_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export type AuthHook = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

/**
 * Build an onRequest hook accepting the given operator key
 */
export function createApiKeyAuth(expectedKey: string | undefined): AuthHook {
  return async (request) => {
    if (OPEN_METHODS.has(request.method)) {
      return;
    }

    if (expectedKey === undefined) {
      throw unauthorized('No operator API key configured');
    }

    const apiKey = request.headers['x-api-key'];

    if (!apiKey) {
      throw unauthorized('API key required. Provide X-API-Key header.');
    }

    if (typeof apiKey !== 'string' || apiKey !== expectedKey) {
      throw unauthorized('Invalid API key');
    }
  };
}
