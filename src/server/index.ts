/**
 * Voting Server Module
 *
 * @example
 * ```typescript
 * import { VotingServer } from 'paillier-ballot';
 *
 * const server = new VotingServer({ port: 8888 });
 * await server.listen();
 * const report = await server.waitForReport();
 * ```
 */

export { VotingServer } from './voting-server.js';
export type { VotingServerOptions, ServerReportListener } from './types.js';
