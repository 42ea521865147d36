import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { errorMessage } from '../../agent/errors';
import { formatError, formatRunResult, formatStep } from '../formatters';
import { validateSessionId } from '../validators';
import { createCliRunner, exitCodeFor, withInterrupts } from './run';

type ResumeCommandOptions = {
  yes?: boolean;
  answer?: string;
  verbose?: boolean;
};

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Resume a suspended or interrupted session')
    .argument('<sessionId>', 'Session to resume')
    .option('--answer <text>', 'Answer to the pending question (prompted when omitted)')
    .option('-y, --yes', 'Approve critical actions without asking', false)
    .option('--verbose', 'Show detailed output')
    .action(async (sessionId: string, options: ResumeCommandOptions) => {
      try {
        const id = validateSessionId(sessionId);
        const verbose = program.opts().verbose === true || Boolean(options.verbose);
        const config = loadConfig();

        console.log(formatStep(`Resuming session ${id}`));
        const runner = await createCliRunner(config, id, { verbose, yes: Boolean(options.yes) });
        const result = await withInterrupts(runner, () => runner.resume(id, { response: options.answer }));

        console.log(formatRunResult(result, { verbose }));
        process.exitCode = exitCodeFor(result);
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
