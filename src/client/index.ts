/**
 * Voter Client Module
 */

export { VoterClient } from './voter-client.js';
export { ClientState } from './types.js';
export type { VoteChoice, VoterClientOptions, ClientRole, TallyResult } from './types.js';
