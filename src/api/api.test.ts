/**
 * Status API Tests
 *
 * Endpoints exercised through fastify's inject against a live voting server
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createStatusServer } from './server.js';
import { VotingServer } from '../server/voting-server.js';
import { VoterClient } from '../client/voter-client.js';

describe('Status API', () => {
  const apiKey = 'test-secret';
  let votingServer: VotingServer;
  let server: FastifyInstance;
  let clients: VoterClient[];

  beforeEach(async () => {
    clients = [];
    votingServer = new VotingServer({ port: 0, sessionId: 'test-session', responseTimeoutMs: 5_000 });
    await votingServer.listen();

    server = await createStatusServer({
      votingServer,
      logger: false,
      enableRateLimit: false,
      apiKey,
    });
  });

  afterEach(async () => {
    await Promise.all(clients.map((client) => client.close()));
    await server.close();
    await votingServer.close();
  });

  async function join(): Promise<VoterClient> {
    const port = votingServer.address()?.port;
    const client = new VoterClient({ port, timeoutMs: 5_000 });
    clients.push(client);
    await client.connect();
    return client;
  }

  describe('Health Check', () => {
    it('should report healthy while the voting server listens', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.listening).toBe(true);
      expect(body.version).toBe('0.1.0');
      expect(body.timestamp).toBeDefined();
    });

    it('should report unhealthy once the voting server is closed', async () => {
      await votingServer.close();

      const response = await server.inject({ method: 'GET', url: '/health' });
      const body = JSON.parse(response.body);
      expect(body.status).toBe('unhealthy');
      expect(body.listening).toBe(false);
    });
  });

  describe('Root Endpoint', () => {
    it('should return API information', async () => {
      const response = await server.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.name).toBe('Paillier Ballot Status API');
      expect(body.endpoints.session.tally).toBe('POST /v1/session/tally');
    });
  });

  describe('Session Status', () => {
    it('should describe a fresh session', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/session' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.sessionId).toBe('test-session');
      expect(body.phase).toBe('REGISTERING');
      expect(body.nextPhase).toBe('KEY_DISTRIBUTION');
      expect(body.voters.registered).toBe(0);
      expect(body.hasPublicKey).toBe(false);
      expect(body.tally).toBeNull();
      expect(body.fraudDetected).toBeNull();
    });

    it('should count registered voters', async () => {
      await join();
      await join();

      const body = JSON.parse((await server.inject({ method: 'GET', url: '/v1/session' })).body);
      expect(body.phase).toBe('COLLECTING');
      expect(body.voters.registered).toBe(2);
      expect(body.hasKeyHolder).toBe(true);
      expect(body.hasPublicKey).toBe(true);
    });
  });

  describe('Verification Report', () => {
    it('should return 404 before verification completes', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/session/report' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        error: {
          message: 'Verification report not found: test-session',
          code: 'NOT_FOUND',
          statusCode: 404,
        },
      });
    });
  });

  describe('Audit Log', () => {
    it('should return the chain and its integrity', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/session/audit' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.sessionId).toBe('test-session');
      expect(body.valid).toBe(true);
      expect(body.total).toBe(1);
      expect(body.entries[0].eventType).toBe('SESSION_CREATED');
      expect(body.entries[0].previousHash).toBe('0'.repeat(64));
    });

    it('should return only the most recent entries when limited', async () => {
      await join();

      const response = await server.inject({ method: 'GET', url: '/v1/session/audit?limit=1' });
      const body = JSON.parse(response.body);
      expect(body.total).toBeGreaterThan(1);
      expect(body.entries).toHaveLength(1);
      expect(body.entries[0].sequence).toBe(body.total - 1);
    });

    it('should reject a non-positive limit', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/session/audit?limit=0' });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('Tally Trigger', () => {
    it('should require the API key', async () => {
      const response = await server.inject({ method: 'POST', url: '/v1/session/tally' });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error.message).toBe(
        'API key required. Provide X-API-Key header.'
      );
    });

    it('should reject a wrong API key', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/session/tally',
        headers: { 'x-api-key': 'wrong-key' },
      });

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error.message).toBe('Invalid API key');
    });

    it('should refuse writes when no operator key is configured', async () => {
      const open = await createStatusServer({ votingServer, logger: false, enableRateLimit: false });

      const response = await open.inject({
        method: 'POST',
        url: '/v1/session/tally',
        headers: { 'x-api-key': apiKey },
      });
      await open.close();

      expect(response.statusCode).toBe(401);
      expect(JSON.parse(response.body).error.message).toBe('No operator API key configured');
    });

    it('should answer 409 before a public key exists', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/session/tally',
        headers: { 'x-api-key': apiKey },
      });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body)).toEqual({
        error: {
          message: 'No public key available for tallying',
          code: 'NO_PUBLIC_KEY',
          statusCode: 409,
        },
      });
    });

    it('should run the election to a report', async () => {
      const holder = await join();
      const alice = await join();
      await holder.castVote('yes');
      await alice.castVote('yes');

      const response = await server.inject({
        method: 'POST',
        url: '/v1/session/tally',
        headers: { 'x-api-key': apiKey },
      });

      expect(response.statusCode).toBe(200);
      const started = JSON.parse(response.body);
      expect(started.voteCount).toBe(2);
      expect(started.encryptedSum).toMatch(/^\d+$/);

      expect(await Promise.all([holder.awaitChallenge(), alice.awaitChallenge()])).toEqual([
        true,
        true,
      ]);
      await votingServer.waitForReport();

      const report = JSON.parse(
        (await server.inject({ method: 'GET', url: '/v1/session/report' })).body
      );
      expect(report.sessionId).toBe('test-session');
      expect(report.validCount).toBe(2);
      expect(report.fraudDetected).toBe(false);
      expect(report.tally.result).toBe('2');
      expect(report.tally.outcome).toBe('YES');
      expect(report.tally.encryptedSum).toBe(started.encryptedSum);

      const status = JSON.parse((await server.inject({ method: 'GET', url: '/v1/session' })).body);
      expect(status.phase).toBe('CLOSED');
      expect(status.fraudDetected).toBe(false);
    });
  });
});
