/**
 * Voting Server
 *
 * Accepts voter connections over TCP and drives each one through the
 * protocol: registration, key distribution, ballot, tally and proof round.
 * Every connection handler mutates the election only through the shared
 * SessionCoordinator.
 *
 * @module server
 */

import { createServer, type AddressInfo, type Server, type Socket } from 'net';
import { ProtocolViolation, SessionError, VotingError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { VotingConfig } from '../config/types.js';
import {
  decodeClientMessage,
  type ClientMessage,
  type ServerMessage,
} from '../protocol/messages.js';
import { MessageStream } from '../protocol/stream.js';
import { SessionCoordinator } from '../session/coordinator.js';
import type { TallyRecord, VerificationReport, Voter } from '../session/types.js';
import type { ServerReportListener, VotingServerOptions } from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

/** Sockets still open this long after shutdown are destroyed */
const CLOSE_GRACE_MS = 1_000;

type ServerStream = MessageStream<ClientMessage, ServerMessage>;

interface Connection {
  voterId: string;
  stream: ServerStream;
  responseTimer?: NodeJS.Timeout;
}

interface ReportWaiter {
  resolve: (report: VerificationReport) => void;
  reject: (err: Error) => void;
}

export class VotingServer {
  private readonly server: Server;
  private readonly coordinator: SessionCoordinator;
  private readonly logger: Logger;
  private readonly connections = new Map<string, Connection>();
  private readonly streams = new Set<ServerStream>();
  private readonly reportListeners = new Set<ServerReportListener>();
  private reportWaiters: ReportWaiter[] = [];
  private shuttingDown = false;
  private closing?: Promise<void>;

  private readonly host: string;
  private readonly port: number;
  private readonly keyHolderTimeoutMs: number;
  private readonly keyDistributionTimeoutMs: number;
  private readonly responseTimeoutMs: number;
  private readonly maxMessageBytes?: number;
  private readonly closeOnReport: boolean;

  constructor(options: VotingServerOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 8888;
    this.keyHolderTimeoutMs = options.keyHolderTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.keyDistributionTimeoutMs = options.keyDistributionTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.responseTimeoutMs = options.responseTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxMessageBytes = options.maxMessageBytes;
    this.closeOnReport = options.closeOnReport ?? true;

    const logger = options.logger ?? silentLogger();
    this.logger = logger.child({ component: 'voting-server' });

    this.coordinator = new SessionCoordinator({
      id: options.sessionId,
      maxVoters: options.maxVoters,
      logger,
    });
    this.coordinator.onReport((report) => this.handleReport(report));

    this.server = createServer((socket) => this.handleConnection(socket));
    this.server.on('error', (err) => this.logger.error({ err }, 'server error'));
  }

  /**
   * Server wired from a validated configuration
   */
  static fromConfig(config: VotingConfig, logger?: Logger): VotingServer {
    return new VotingServer({
      host: config.network.host,
      port: config.network.port,
      keyHolderTimeoutMs: config.timeouts.keyHolderMs,
      keyDistributionTimeoutMs: config.timeouts.keyDistributionMs,
      responseTimeoutMs: config.timeouts.responseMs,
      maxVoters: config.limits.maxVoters,
      maxMessageBytes: config.limits.maxMessageBytes,
      logger,
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start accepting connections
   */
  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once('error', onError);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', onError);
        const address = this.address();
        if (address === null) {
          reject(new Error('Server is not bound to a TCP address'));
          return;
        }
        this.logger.info(
          { host: address.address, port: address.port, sessionId: this.coordinator.getSessionId() },
          'voting server listening'
        );
        resolve(address);
      });
    });
  }

  address(): AddressInfo | null {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address : null;
  }

  /**
   * Cooperative shutdown: stop accepting, end every connection, clear the
   * registry and settle pending waits. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.shuttingDown = true;
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  // ===========================================================================
  // Tally & Report
  // ===========================================================================

  /**
   * Compute the homomorphic sum, forward it to the key holder and challenge
   * every voter.
   *
   * @throws {SessionError} NO_PUBLIC_KEY, TALLY_ALREADY_STARTED or SESSION_ENDED
   */
  startTally(): TallyRecord {
    const tally = this.coordinator.beginTally();

    const keyHolderId = this.coordinator.getKeyHolderId();
    const keyHolder = keyHolderId !== null ? this.connections.get(keyHolderId) : undefined;
    const forwarded = keyHolder?.stream.send({
      type: 'encrypted_sum',
      encrypted_sum: tally.encryptedSum,
      vote_count: tally.voteCount,
    });
    if (!forwarded) {
      this.logger.warn({ keyHolderId }, 'key holder unreachable, tally will not be decrypted');
    }

    const issued = this.coordinator.issueChallenges(
      (voterId) => this.connections.get(voterId)?.stream.isOpen() ?? false
    );

    for (const { voterId, challenge } of issued) {
      const connection = this.connections.get(voterId);
      if (!connection?.stream.send({ type: 'zkp_challenge', challenge: challenge.e })) {
        this.coordinator.expireChallenge(voterId, 'withdrawn');
        continue;
      }

      connection.responseTimer = setTimeout(() => {
        connection.responseTimer = undefined;
        this.coordinator.expireChallenge(voterId, 'timeout');
      }, this.responseTimeoutMs);
    }

    return tally;
  }

  /**
   * Resolve with the verification report once the proof round completes
   *
   * @throws {SessionError} SESSION_CLOSED if the server shut down without one
   */
  waitForReport(): Promise<VerificationReport> {
    const report = this.coordinator.getReport();
    if (report) {
      return Promise.resolve(report);
    }
    if (this.shuttingDown) {
      return Promise.reject(
        new SessionError('Server closed without a verification report', 'SESSION_CLOSED')
      );
    }
    return new Promise((resolve, reject) => {
      this.reportWaiters.push({ resolve, reject });
    });
  }

  /**
   * @returns Unsubscribe function
   */
  onReport(listener: ServerReportListener): () => void {
    this.reportListeners.add(listener);
    return () => {
      this.reportListeners.delete(listener);
    };
  }

  getCoordinator(): SessionCoordinator {
    return this.coordinator;
  }

  getConnectionCount(): number {
    return this.streams.size;
  }

  // ===========================================================================
  // Connection Handling
  // ===========================================================================

  private handleConnection(socket: Socket): void {
    const stream = new MessageStream<ClientMessage, ServerMessage>(socket, decodeClientMessage, {
      maxMessageBytes: this.maxMessageBytes,
    });

    if (this.shuttingDown) {
      stream.send({ type: 'error', message: 'Server is shutting down', code: 'SESSION_ENDED' });
      stream.end();
      return;
    }

    const voter = this.register(stream);
    if (!voter) {
      return;
    }

    this.streams.add(stream);
    this.serve(stream, voter).catch((err: unknown) =>
      this.logger.error({ err, voterId: voter.id }, 'connection handler failed')
    );
  }

  private register(stream: ServerStream): Voter | null {
    try {
      return this.coordinator.registerVoter();
    } catch (err) {
      this.logger.info({ remoteAddress: stream.remoteAddress }, 'connection refused');
      this.fail(stream, err);
      return null;
    }
  }

  private async serve(stream: ServerStream, voter: Voter): Promise<void> {
    const { id: voterId, isKeyHolder } = voter;
    const connection: Connection = { voterId, stream };
    this.connections.set(voterId, connection);

    try {
      stream.send({ type: 'client_id', client_id: voterId, key_holder: isKeyHolder });

      if (isKeyHolder) {
        const message = await stream.next(this.keyHolderTimeoutMs);
        if (message.type !== 'public_key') {
          throw new ProtocolViolation(
            `Expected public_key, received ${message.type}`,
            'UNEXPECTED_MESSAGE'
          );
        }
        this.coordinator.publishPublicKey(voterId, message.public_key);
        stream.send({ type: 'first_client_confirmed' });
      } else {
        const publicKey = await this.coordinator.whenPublicKey(this.keyDistributionTimeoutMs);
        stream.send({ type: 'shared_public_key', public_key: publicKey });
      }

      for await (const message of stream) {
        this.dispatch(connection, message);
      }
    } catch (err) {
      this.fail(stream, err, voterId);
    } finally {
      clearTimeout(connection.responseTimer);
      this.connections.delete(voterId);
      this.streams.delete(stream);
      this.coordinator.withdrawVoter(voterId);
    }
  }

  /**
   * Session-level refusals are answered and the connection kept; anything
   * else propagates and drops the connection.
   */
  private dispatch(connection: Connection, message: ClientMessage): void {
    const { voterId, stream } = connection;

    try {
      switch (message.type) {
        case 'vote':
          this.coordinator.recordVote(voterId, message.encrypted_vote, { a: message.commitment });
          stream.send({ type: 'vote_received' });
          break;

        case 'get_results':
          // Repeated requests once the tally exists are no-ops
          if (this.coordinator.getTally() !== null) {
            this.logger.debug({ voterId }, 'tally already started');
            break;
          }
          this.logger.info({ voterId }, 'tally requested');
          this.startTally();
          break;

        case 'tally_result':
          this.coordinator.recordTallyResult(voterId, message.tally);
          break;

        case 'zkp_response':
          clearTimeout(connection.responseTimer);
          connection.responseTimer = undefined;
          this.coordinator.recordProofResponse(voterId, {
            u: message.u,
            v: message.v,
            w: message.w,
          });
          break;

        case 'public_key':
          throw new ProtocolViolation('Public key already exchanged', 'UNEXPECTED_MESSAGE');
      }
    } catch (err) {
      if (!(err instanceof SessionError)) {
        throw err;
      }
      this.logger.info({ voterId, code: err.code }, err.message);
      stream.send({ type: 'error', message: err.message, code: err.code });
    }
  }

  private fail(stream: ServerStream, err: unknown, voterId?: string): void {
    if (err instanceof VotingError) {
      if (err.code !== 'CONNECTION_CLOSED') {
        this.logger.warn({ voterId, code: err.code }, err.message);
        stream.send({ type: 'error', message: err.message, code: err.code });
      }
    } else {
      this.logger.error({ err, voterId }, 'unexpected connection error');
      stream.send({ type: 'error', message: 'Internal server error', code: 'INTERNAL_ERROR' });
    }
    stream.end();
  }

  // ===========================================================================
  // Shutdown
  // ===========================================================================

  private handleReport(report: VerificationReport): void {
    for (const entry of report.results) {
      this.connections.get(entry.voterId)?.stream.send({ type: 'zkp_result', valid: entry.valid });
    }

    for (const listener of this.reportListeners) {
      listener(report);
    }
    for (const waiter of this.reportWaiters.splice(0)) {
      waiter.resolve(report);
    }

    if (this.closeOnReport && !this.shuttingDown) {
      this.close().catch((err: unknown) => this.logger.error({ err }, 'shutdown failed'));
    }
  }

  private async shutdown(): Promise<void> {
    this.logger.info({ connections: this.streams.size }, 'voting server shutting down');

    for (const connection of this.connections.values()) {
      clearTimeout(connection.responseTimer);
      connection.responseTimer = undefined;
    }

    this.coordinator.close('shutdown');

    const closed = new Promise<void>((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((err) => (err ? reject(err) : resolve()));
    });

    for (const stream of this.streams) {
      stream.end();
      setTimeout(() => stream.destroy(), CLOSE_GRACE_MS).unref();
    }

    await closed;

    this.coordinator.clear();

    const refusal = new SessionError('Server closed without a verification report', 'SESSION_CLOSED');
    for (const waiter of this.reportWaiters.splice(0)) {
      waiter.reject(refusal);
    }

    this.logger.info('voting server closed');
  }
}
