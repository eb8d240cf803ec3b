#!/usr/bin/env node
/**
 * Command-line entry point
 *
 *   paillier-ballot [server]              voting server plus the status API
 *   paillier-ballot vote <yes|no> [--tally]
 *                                         join the running election as one voter
 *   paillier-ballot simulate              in-process election with one forged proof
 *
 * Settings come from VOTING_* environment variables.
 */

import { loadConfig, type VotingConfig } from './config/index.js';
import { createLogger, type Logger } from './logger.js';
import { createProgram } from './cli/program.js';
import { runServer, runVoter, runSimulation } from './cli/commands.js';

function setup(): { config: VotingConfig; logger: Logger } {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: process.stdout.isTTY });
  return { config, logger };
}

const program = createProgram({
  server: () => {
    const { config, logger } = setup();
    return runServer(config, logger);
  },
  vote: (choice, options) => {
    const { config, logger } = setup();
    return runVoter(config, logger, choice, options);
  },
  simulate: () => {
    runSimulation(setup().logger);
  },
});

program.parseAsync().catch((err: unknown) => {
  console.error('Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
