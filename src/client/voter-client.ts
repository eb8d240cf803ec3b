/**
 * Voter Client
 *
 * One voter's side of the protocol. The server designates the key holder
 * in its first message; that client generates the key pair, publishes the
 * public key and later decrypts the aggregate. Every client encrypts its
 * ballot, commits to fresh proof randomness and answers one challenge.
 *
 * Calls are sequential: each waits for the server's reply before returning.
 *
 * @module client
 */

import { connect as connectSocket, type Socket } from 'net';
import { ProtocolViolation, SessionError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { classifyTally, decrypt, encrypt, generateKeyPair } from '../paillier/index.js';
import type { PaillierKeyConfig, PaillierKeyPair, PaillierPublicKey } from '../paillier/types.js';
import { commit, respond } from '../sigma/index.js';
import type { CommitmentPair, ProofWitness } from '../sigma/types.js';
import {
  decodeServerMessage,
  type ClientMessage,
  type ServerMessage,
  type ServerMessageType,
} from '../protocol/messages.js';
import { MessageStream } from '../protocol/stream.js';
import {
  ClientState,
  type ClientRole,
  type TallyResult,
  type VoteChoice,
  type VoterClientOptions,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const CLOSE_GRACE_MS = 1_000;

/** Server error codes that are session-level refusals */
const SESSION_ERROR_CODES = new Set([
  'SESSION_ENDED',
  'SESSION_FULL',
  'SESSION_CLOSED',
  'DUPLICATE_VOTE',
  'DUPLICATE_VOTER',
  'NO_PUBLIC_KEY',
  'TALLY_ALREADY_STARTED',
  'KEY_HOLDER_WITHDRAWN',
]);

type ClientStream = MessageStream<ServerMessage, ClientMessage>;

type MessageOf<T extends ServerMessageType> = Extract<ServerMessage, { type: T }>;

function isMessageOf<T extends ServerMessageType>(
  message: ServerMessage,
  type: T
): message is MessageOf<T> {
  return message.type === type;
}

function errorFrom(message: MessageOf<'error'>): SessionError | ProtocolViolation {
  const code = message.code ?? 'SERVER_ERROR';
  return SESSION_ERROR_CODES.has(code)
    ? new SessionError(message.message, code)
    : new ProtocolViolation(message.message, code);
}

interface Ballot {
  witness: ProofWitness;
  proof: CommitmentPair;
}

export class VoterClient {
  private readonly host: string;
  private readonly port: number;
  private readonly keyConfig?: PaillierKeyConfig;
  private readonly timeoutMs: number;
  private readonly challengeTimeoutMs?: number;
  private readonly maxMessageBytes?: number;
  private readonly forgeProof: boolean;
  private readonly logger: Logger;

  private state = ClientState.CONNECTING;
  private socket?: Socket;
  private stream?: ClientStream;
  private voterId: string | null = null;
  private keyHolder = false;
  private keyPair: PaillierKeyPair | null = null;
  private publicKey: PaillierPublicKey | null = null;
  private ballot: Ballot | null = null;
  private tallyResult: TallyResult | null = null;

  constructor(options: VoterClientOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 8888;
    this.keyConfig = options.keyConfig;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.challengeTimeoutMs = options.challengeTimeoutMs;
    this.maxMessageBytes = options.maxMessageBytes;
    this.forgeProof = options.forgeProof ?? false;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'voter-client' });
  }

  // ===========================================================================
  // Protocol Steps
  // ===========================================================================

  /**
   * Open the connection and negotiate the role.
   *
   * @throws {SessionError} If the server refuses the registration
   * @throws {ProtocolViolation} On a connection failure or unexpected reply
   */
  async connect(): Promise<ClientRole> {
    if (this.state !== ClientState.CONNECTING) {
      throw new ProtocolViolation('Client already connected', 'INVALID_STATE', { state: this.state });
    }

    const socket = await this.openSocket();
    this.socket = socket;
    this.stream = new MessageStream<ServerMessage, ClientMessage>(socket, decodeServerMessage, {
      maxMessageBytes: this.maxMessageBytes,
    });

    this.state = ClientState.ROLE_NEGOTIATION;
    const assigned = await this.expect('client_id');
    this.voterId = assigned.client_id;
    this.keyHolder = assigned.key_holder;

    if (this.keyHolder) {
      this.state = ClientState.KEY_HOLDER;
      const keyPair = generateKeyPair(this.keyConfig);
      this.keyPair = keyPair;
      this.send({ type: 'public_key', public_key: keyPair.publicKey });
      await this.expect('first_client_confirmed');
      this.publicKey = keyPair.publicKey;
    } else {
      this.state = ClientState.VOTER;
      const shared = await this.expect('shared_public_key');
      this.publicKey = shared.public_key;
    }

    this.logger.info({ voterId: this.voterId, keyHolder: this.keyHolder }, 'connected');
    return { voterId: assigned.client_id, isKeyHolder: this.keyHolder };
  }

  /**
   * Encrypt and submit the ballot, keeping the witness for the proof round
   *
   * @returns The submitted ciphertext
   */
  async castVote(choice: VoteChoice): Promise<bigint> {
    const publicKey = this.publicKey;
    if (
      publicKey === null ||
      (this.state !== ClientState.KEY_HOLDER && this.state !== ClientState.VOTER)
    ) {
      throw new ProtocolViolation(`Cannot vote in state ${this.state}`, 'INVALID_STATE', {
        state: this.state,
      });
    }

    this.state = ClientState.VOTING;

    const value = choice === 'yes' ? 1n : -1n;
    const { ciphertext, randomness } = encrypt(value, publicKey);
    const proof = commit(publicKey);
    this.ballot = { witness: { value, randomness }, proof };

    this.send({ type: 'vote', encrypted_vote: ciphertext, commitment: proof.commitment.a });
    await this.expect('vote_received');

    this.state = ClientState.AWAITING_CHALLENGE;
    this.logger.info({ voterId: this.voterId }, 'vote cast');
    return ciphertext;
  }

  /**
   * Ask the server to tally. The key holder then receives the encrypted sum,
   * decrypts it and reports the result back.
   *
   * @returns The decrypted tally for the key holder, null for anyone else
   */
  async requestResults(): Promise<TallyResult | null> {
    if (this.tallyResult) {
      return this.tallyResult;
    }

    this.send({ type: 'get_results' });

    if (!this.keyHolder) {
      return null;
    }

    const sum = await this.expect('encrypted_sum');
    return this.decryptAndReport(sum);
  }

  /**
   * Answer the proof challenge and wait for the server's verdict.
   * The connection is closed afterwards. Both waits depend on when the
   * tally starts and when every other voter has answered, so they are
   * bounded by `challengeTimeoutMs` only.
   *
   * @returns Whether the server accepted the proof
   */
  async awaitChallenge(): Promise<boolean> {
    const ballot = this.ballot;
    const publicKey = this.publicKey;
    if (ballot === null || publicKey === null) {
      throw new ProtocolViolation('No ballot cast', 'INVALID_STATE', { state: this.state });
    }

    this.state = ClientState.AWAITING_CHALLENGE;
    const { challenge } = await this.expect('zkp_challenge', false);

    this.state = ClientState.RESPONDING;
    const witness: ProofWitness = this.forgeProof
      ? { value: -ballot.witness.value, randomness: ballot.witness.randomness }
      : ballot.witness;
    const { v, w } = respond(ballot.proof.secret, { e: challenge }, witness, publicKey);

    this.send({ type: 'zkp_response', u: ballot.proof.commitment.a, v, w });
    const { valid } = await this.expect('zkp_result', false);

    this.logger.info({ voterId: this.voterId, valid }, 'proof round finished');
    await this.close();
    return valid;
  }

  /**
   * End the connection. Idempotent.
   */
  close(): Promise<void> {
    this.state = ClientState.CLOSED;

    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
      setTimeout(() => socket.destroy(), CLOSE_GRACE_MS).unref();
    });
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  getState(): ClientState {
    return this.state;
  }

  isKeyHolder(): boolean {
    return this.keyHolder;
  }

  getVoterId(): string | null {
    return this.voterId;
  }

  getPublicKey(): PaillierPublicKey | null {
    return this.publicKey;
  }

  getTallyResult(): TallyResult | null {
    return this.tallyResult;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private openSocket(): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = connectSocket({ host: this.host, port: this.port });
      const onError = (err: Error) => {
        reject(
          new ProtocolViolation('Connection failed', 'CONNECTION_FAILED', {
            host: this.host,
            port: this.port,
            reason: err.message,
          })
        );
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }

  private send(message: ClientMessage): void {
    if (!this.stream?.send(message)) {
      throw new ProtocolViolation('Connection closed', 'CONNECTION_CLOSED', {
        type: message.type,
      });
    }
  }

  /**
   * Wait for a message of the given type. An encrypted sum arriving in the
   * meantime is decrypted and reported if this client is the key holder.
   *
   * @param bounded - Apply the per-message timeout; otherwise `challengeTimeoutMs`
   */
  private async expect<T extends ServerMessageType>(
    type: T,
    bounded = true
  ): Promise<MessageOf<T>> {
    const stream = this.stream;
    if (!stream) {
      throw new ProtocolViolation('Not connected', 'INVALID_STATE', { state: this.state });
    }

    while (true) {
      const message = await stream.next(bounded ? this.timeoutMs : this.challengeTimeoutMs);

      if (isMessageOf(message, type)) {
        return message;
      }
      if (isMessageOf(message, 'error')) {
        throw errorFrom(message);
      }
      if (isMessageOf(message, 'encrypted_sum') && this.keyHolder) {
        this.decryptAndReport(message);
        continue;
      }

      throw new ProtocolViolation(
        `Expected ${type}, received ${message.type}`,
        'UNEXPECTED_MESSAGE',
        { state: this.state }
      );
    }
  }

  private decryptAndReport(message: MessageOf<'encrypted_sum'>): TallyResult {
    const keyPair = this.keyPair;
    if (keyPair === null) {
      throw new ProtocolViolation('Received a tally without holding the key', 'NOT_KEY_HOLDER');
    }

    const previous = this.state;
    this.state = ClientState.RESULT_DECRYPTION;

    const tally = decrypt(message.encrypted_sum, keyPair);
    const result: TallyResult = {
      tally,
      outcome: classifyTally(tally),
      voteCount: message.vote_count,
    };
    this.tallyResult = result;

    this.send({ type: 'tally_result', tally });
    this.logger.info(
      { voterId: this.voterId, outcome: result.outcome, voteCount: result.voteCount },
      'tally decrypted'
    );

    this.state = previous;
    return result;
  }
}
