import { Argument, Command, InvalidArgumentError, type OutputConfiguration } from 'commander';
import type { VoteChoice } from '../client/types.js';
import { API_VERSION } from '../api/routes/health.js';

export interface VoteOptions {
  /** Ask the server to start the tally after voting */
  tally?: boolean;
}

/**
 * What each command does once its arguments are parsed
 */
export interface CliHandlers {
  server(): Promise<void>;
  vote(choice: VoteChoice, options: VoteOptions): Promise<void>;
  simulate(): Promise<void> | void;
}

export interface ProgramSettings {
  /** Throw a CommanderError instead of exiting the process */
  exitOverride?: boolean;
  output?: OutputConfiguration;
}

export function parseChoice(value: string): VoteChoice {
  if (value === 'yes' || value === 'no') {
    return value;
  }
  throw new InvalidArgumentError('Vote must be "yes" or "no".');
}

export function createProgram(handlers: CliHandlers, settings: ProgramSettings = {}): Command {
  const program = new Command();

  program
    .name('paillier-ballot')
    .description('Homomorphic YES/NO voting with verifiable ballots')
    .version(API_VERSION);

  // Subcommands inherit these when created
  if (settings.exitOverride) program.exitOverride();
  if (settings.output) program.configureOutput(settings.output);

  program
    .command('server', { isDefault: true })
    .description('Run the voting server and the status API')
    .action(() => handlers.server());

  program
    .command('vote')
    .description('Join the running election as one voter')
    .addArgument(new Argument('<choice>', 'yes or no').argParser(parseChoice))
    .option('--tally', 'Start the tally after voting')
    .action((choice: VoteChoice, opts: VoteOptions) => handlers.vote(choice, { tally: opts.tally === true }));

  program
    .command('simulate')
    .description('Run an in-process election with one forged proof')
    .action(() => handlers.simulate());

  return program;
}
