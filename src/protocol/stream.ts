/**
 * Message Stream
 *
 * Frames a socket into newline-terminated records, decodes each one, and
 * hands them out in arrival order through `next()` or async iteration.
 * A decode failure is queued in place of the record, so the consumer sees
 * it exactly where it occurred.
 */

import type { Socket } from 'net';
import { ProtocolTimeout, ProtocolViolation } from '../errors.js';
import { encodeMessage, type ClientMessage, type ServerMessage } from './messages.js';

/** 1 MiB */
export const DEFAULT_MAX_MESSAGE_BYTES = 1024 * 1024;

export interface MessageStreamOptions {
  /** Longest record accepted, terminated or not */
  maxMessageBytes?: number;
}

type Entry<T> = { ok: true; message: T } | { ok: false; error: Error };

interface Waiter<T> {
  resolve: (entry: Entry<T> | null) => void;
  timer?: NodeJS.Timeout;
}

export class MessageStream<TIn, TOut extends ClientMessage | ServerMessage> {
  private buffer = '';
  private readonly queue: Entry<TIn>[] = [];
  private readonly waiters: Waiter<TIn>[] = [];
  private ended = false;
  private closeReason?: Error;
  private readonly maxMessageBytes: number;

  constructor(
    private readonly socket: Socket,
    private readonly decode: (line: string) => TIn,
    options: MessageStreamOptions = {}
  ) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('close', () => this.onEnd());
    socket.on('error', (err) => {
      this.closeReason = err;
      this.onEnd();
    });
  }

  /**
   * Wait for the next record.
   *
   * @param timeoutMs - Bounded wait; omit to wait indefinitely
   * @throws {ProtocolTimeout} If the wait elapses
   * @throws {ProtocolViolation} If the record was malformed or the connection closed
   */
  async next(timeoutMs?: number): Promise<TIn> {
    const entry = await this.pull(timeoutMs);
    if (entry === null) {
      throw new ProtocolViolation('Connection closed', 'CONNECTION_CLOSED', {
        reason: this.closeReason?.message,
      });
    }
    if (!entry.ok) {
      throw entry.error;
    }
    return entry.message;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TIn, void, undefined> {
    while (true) {
      const entry = await this.pull();
      if (entry === null) return;
      if (!entry.ok) throw entry.error;
      yield entry.message;
    }
  }

  /**
   * Write one record. Returns false if the socket is no longer writable.
   */
  send(message: TOut): boolean {
    if (this.ended || !this.socket.writable) {
      return false;
    }
    this.socket.write(encodeMessage(message));
    return true;
  }

  /**
   * Flush pending writes and half-close
   */
  end(): void {
    if (!this.socket.destroyed) {
      this.socket.end();
    }
  }

  /**
   * Tear the connection down immediately
   */
  destroy(): void {
    this.socket.destroy();
    this.onEnd();
  }

  isOpen(): boolean {
    return !this.ended;
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private pull(timeoutMs?: number): Promise<Entry<TIn> | null> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    return new Promise<Entry<TIn> | null>((resolve) => {
      const waiter: Waiter<TIn> = { resolve };

      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          resolve({
            ok: false,
            error: new ProtocolTimeout(`No message within ${timeoutMs}ms`, { timeoutMs }),
          });
        }, timeoutMs);
      }

      this.waiters.push(waiter);
    });
  }

  private onData(chunk: string): void {
    if (this.ended) return;

    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);

      if (line.length > 0) {
        this.push(
          Buffer.byteLength(line, 'utf8') > this.maxMessageBytes
            ? this.oversized()
            : this.decodeLine(line)
        );
      }

      newline = this.buffer.indexOf('\n');
    }

    if (Buffer.byteLength(this.buffer, 'utf8') > this.maxMessageBytes) {
      this.buffer = '';
      this.push(this.oversized());
    }
  }

  private oversized(): Entry<TIn> {
    return {
      ok: false,
      error: new ProtocolViolation('Message exceeds size limit', 'MESSAGE_TOO_LARGE', {
        maxMessageBytes: this.maxMessageBytes,
      }),
    };
  }

  private decodeLine(line: string): Entry<TIn> {
    try {
      return { ok: true, message: this.decode(line) };
    } catch (err) {
      return {
        ok: false,
        error: err instanceof Error ? err : new ProtocolViolation(String(err)),
      };
    }
  }

  private push(entry: Entry<TIn>): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(entry);
      return;
    }
    this.queue.push(entry);
  }

  private onEnd(): void {
    if (this.ended) return;
    this.ended = true;

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}
