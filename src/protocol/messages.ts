/**
 * Wire Messages
 *
 * Newline-delimited JSON records, each tagged with `type`. Big integers
 * travel as decimal strings so no precision is lost in JSON.
 */

import { z } from 'zod';
import { ProtocolViolation } from '../errors.js';

// =============================================================================
// Field Schemas
// =============================================================================

const Natural = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative decimal integer')
  .transform((value) => BigInt(value));

const Signed = z
  .string()
  .regex(/^-?\d+$/, 'expected a decimal integer')
  .transform((value) => BigInt(value));

export const PublicKeySchema = z
  .object({ g: Natural, n: Natural })
  .refine((key) => key.n > 2n && key.g === key.n + 1n, {
    message: 'public key must satisfy n > 2 and g = n + 1',
  });

// =============================================================================
// Client → Server
// =============================================================================

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('public_key'), public_key: PublicKeySchema }),
  z.object({ type: z.literal('vote'), encrypted_vote: Natural, commitment: Natural }),
  z.object({ type: z.literal('get_results') }),
  z.object({ type: z.literal('tally_result'), tally: Signed }),
  z.object({ type: z.literal('zkp_response'), u: Natural, v: Natural, w: Natural }),
]);

export type ClientMessage = z.output<typeof ClientMessageSchema>;

// =============================================================================
// Server → Client
// =============================================================================

export const ServerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('client_id'), client_id: z.string().min(1), key_holder: z.boolean() }),
  z.object({ type: z.literal('shared_public_key'), public_key: PublicKeySchema }),
  z.object({ type: z.literal('first_client_confirmed') }),
  z.object({ type: z.literal('vote_received') }),
  z.object({
    type: z.literal('encrypted_sum'),
    encrypted_sum: Natural,
    vote_count: z.number().int().nonnegative(),
  }),
  z.object({ type: z.literal('zkp_challenge'), challenge: Natural }),
  z.object({ type: z.literal('zkp_result'), valid: z.boolean() }),
  z.object({ type: z.literal('error'), message: z.string(), code: z.string().optional() }),
]);

export type ServerMessage = z.output<typeof ServerMessageSchema>;

export type ClientMessageType = ClientMessage['type'];
export type ServerMessageType = ServerMessage['type'];

// =============================================================================
// Encoding
// =============================================================================

/**
 * Serialize one record, terminator included
 */
export function encodeMessage(message: ClientMessage | ServerMessage): string {
  return (
    JSON.stringify(message, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    ) + '\n'
  );
}

function decodeWith<S extends z.ZodTypeAny>(schema: S, line: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    throw new ProtocolViolation('Malformed message: not valid JSON', 'MALFORMED_MESSAGE', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolViolation('Malformed message', 'MALFORMED_MESSAGE', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return parsed.data;
}

/**
 * @throws {ProtocolViolation} If the line is not a valid client record
 */
export function decodeClientMessage(line: string): ClientMessage {
  return decodeWith(ClientMessageSchema, line);
}

/**
 * @throws {ProtocolViolation} If the line is not a valid server record
 */
export function decodeServerMessage(line: string): ServerMessage {
  return decodeWith(ServerMessageSchema, line);
}
