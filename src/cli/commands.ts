/**
 * Command bodies behind the CLI
 */

import { keyConfigFrom, type VotingConfig } from '../config/index.js';
import type { Logger } from '../logger.js';
import { VotingServer } from '../server/voting-server.js';
import { startStatusServer } from '../api/server.js';
import { VoterClient } from '../client/voter-client.js';
import type { VoteChoice } from '../client/types.js';
import { runVotingSimulation } from '../simulation/index.js';
import type { VoteOptions } from './program.js';

export async function runServer(config: VotingConfig, logger: Logger): Promise<void> {
  const votingServer = VotingServer.fromConfig(config, logger);
  await votingServer.listen();

  const api = await startStatusServer({
    votingServer,
    host: config.network.host,
    port: config.network.statusPort,
    apiKey: config.apiKey,
    logger: logger.child({ component: 'status-api' }),
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'shutting down');

    Promise.all([api.close(), votingServer.close()]).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  votingServer.onReport((report) => {
    logger.info(
      {
        outcome: report.tally?.outcome,
        validCount: report.validCount,
        ballots: report.results.length,
        fraudDetected: report.fraudDetected,
      },
      'election finished'
    );
  });
}

export async function runVoter(
  config: VotingConfig,
  logger: Logger,
  choice: VoteChoice,
  options: VoteOptions = {}
): Promise<void> {
  const client = new VoterClient({
    host: config.network.host,
    port: config.network.port,
    keyConfig: keyConfigFrom(config),
    timeoutMs: config.timeouts.responseMs,
    maxMessageBytes: config.limits.maxMessageBytes,
    logger,
  });

  try {
    const role = await client.connect();
    logger.info(role, 'joined election');

    await client.castVote(choice);

    if (options.tally) {
      await client.requestResults();
    }

    const valid = await client.awaitChallenge();
    const tally = client.getTallyResult();
    logger.info(
      {
        valid,
        ...(tally ? { tally: tally.tally.toString(), outcome: tally.outcome } : {}),
      },
      'proof round finished'
    );
  } finally {
    await client.close();
  }
}

export function runSimulation(logger: Logger): void {
  const result = runVotingSimulation(
    [
      ['alice', 'yes'],
      ['bob', 'no'],
      ['carol', 'yes'],
      ['dave', 'yes'],
      ['erin', 'no'],
    ],
    { fraudulentVoters: ['carol'], logger }
  );

  for (const entry of result.verifications) {
    logger.info(entry, 'verification');
  }
  logger.info(
    {
      tally: result.tally.toString(),
      outcome: result.outcome,
      validCount: result.validCount,
      fraudDetected: result.fraudDetected,
    },
    'simulation result'
  );
}
