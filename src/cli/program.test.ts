import { describe, it, expect, vi } from 'vitest';
import { CommanderError } from 'commander';
import { createProgram, parseChoice, type CliHandlers } from './program.js';

function setup() {
  const handlers = {
    server: vi.fn<CliHandlers['server']>(async () => {}),
    vote: vi.fn<CliHandlers['vote']>(async () => {}),
    simulate: vi.fn<CliHandlers['simulate']>(() => {}),
  };
  const program = createProgram(handlers, {
    exitOverride: true,
    output: { writeOut: () => {}, writeErr: () => {} },
  });
  return { handlers, program };
}

describe('CLI', () => {
  it('should run the server when no command is given', async () => {
    const { handlers, program } = setup();

    await program.parseAsync([], { from: 'user' });

    expect(handlers.server).toHaveBeenCalledOnce();
    expect(handlers.vote).not.toHaveBeenCalled();
  });

  it('should pass the choice and the tally flag to vote', async () => {
    const { handlers, program } = setup();

    await program.parseAsync(['vote', 'no', '--tally'], { from: 'user' });

    expect(handlers.vote).toHaveBeenCalledWith('no', { tally: true });
  });

  it('should vote without the tally flag', async () => {
    const { handlers, program } = setup();

    await program.parseAsync(['vote', 'yes'], { from: 'user' });

    expect(handlers.vote).toHaveBeenCalledWith('yes', { tally: false });
  });

  it('should run the simulation', async () => {
    const { handlers, program } = setup();

    await program.parseAsync(['simulate'], { from: 'user' });

    expect(handlers.simulate).toHaveBeenCalledOnce();
  });

  it('should reject a choice other than yes or no', async () => {
    const { handlers, program } = setup();

    const parsing = program.parseAsync(['vote', 'maybe'], { from: 'user' });

    await expect(parsing).rejects.toBeInstanceOf(CommanderError);
    await expect(parsing).rejects.toMatchObject({ code: 'commander.invalidArgument' });
    expect(handlers.vote).not.toHaveBeenCalled();
  });

  it('should reject vote without a choice', async () => {
    const { program } = setup();

    await expect(program.parseAsync(['vote'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.missingArgument',
    });
  });

  it('should narrow the accepted choices', () => {
    expect(parseChoice('yes')).toBe('yes');
    expect(() => parseChoice('YES')).toThrow('Vote must be "yes" or "no".');
  });
});
