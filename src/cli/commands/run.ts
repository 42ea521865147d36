import { Command } from 'commander';
import crypto from 'crypto';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import type { TransitionEvent } from '../../orchestrator/events';
import { createRunnerFromConfig } from '../../orchestrator/register-nodes';
import type { AgentRunner, RunResult } from '../../orchestrator/agent-runner';
import { errorMessage } from '../../agent/errors';
import { CliAgentLogger } from '../logger';
import { InquirerHumanInterface } from '../prompts';
import { formatError, formatInfo, formatProgress, formatRunResult, formatStep, formatTransition, formatWarning } from '../formatters';
import { parsePositiveInt, validateSessionId, validateTask } from '../validators';

// ── Types ───────────────────────────────────────────────────────────────

export type RunCommandOptions = {
  yes?: boolean;
  maxSteps?: string;
  verbose?: boolean;
  session?: string;
};

// ── Shared wiring ───────────────────────────────────────────────────────

/** Builds a terminal-attached runner: prompts, progress lines, verbose transitions */
export async function createCliRunner(config: Config, sessionId: string, opts: { verbose: boolean; yes: boolean }): Promise<AgentRunner> {
  const logger = new CliAgentLogger(sessionId, opts.verbose);
  const runner = await createRunnerFromConfig(config, {
    logger,
    sink: { report: (event) => console.log(formatProgress(event)) },
    human: new InquirerHumanInterface(),
    autoApproveAll: opts.yes,
  });

  if (opts.verbose) {
    runner.events.on('transition', (event: TransitionEvent) => console.log(formatTransition(event.from, event.to, event.step)));
  }
  return runner;
}

/**
 * Runs a task with Ctrl+C wired to cancellation: the first press stops the
 * task before its next step, the second exits immediately.
 */
export async function withInterrupts(runner: AgentRunner, work: () => Promise<RunResult>): Promise<RunResult> {
  let interrupted = false;
  const onSigint = (): void => {
    if (interrupted) {
      console.log(formatError('\nForce exit.'));
      process.exit(130);
    }
    interrupted = true;
    console.log(formatWarning('\nCtrl+C received. Stopping before the next step...'));
    runner.cancel();
  };

  process.on('SIGINT', onSigint);
  try {
    return await work();
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

export function exitCodeFor(result: RunResult): number {
  return result.status === 'completed' || result.status === 'suspended' ? 0 : 1;
}

// ── Command registration ────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a browser task until it completes or needs your input')
    .argument('<task>', 'Task description in natural language')
    .option('-y, --yes', 'Approve critical actions without asking', false)
    .option('--max-steps <n>', 'Maximum number of loop steps')
    .option('--session <id>', 'Session id to use (default: random)')
    .option('--verbose', 'Show detailed output')
    .action(async (task: string, options: RunCommandOptions) => {
      await executeRunCommand(task, options, program.opts().verbose === true);
    });
}

export async function executeRunCommand(task: string, options: RunCommandOptions, globalVerbose = false): Promise<void> {
  try {
    const description = validateTask(task);
    const sessionId = options.session ? validateSessionId(options.session) : crypto.randomUUID();
    const verbose = globalVerbose || Boolean(options.verbose);
    const maxSteps = options.maxSteps ? parsePositiveInt(options.maxSteps, '--max-steps') : undefined;

    const config = loadConfig(maxSteps ? { agent: { max_steps: maxSteps } } : {});
    console.log(formatStep(`Starting task: ${description}`));
    if (verbose) console.log(formatInfo(`session ${sessionId}, up to ${config.agent.max_steps} steps`));

    const runner = await createCliRunner(config, sessionId, { verbose, yes: Boolean(options.yes) });
    const result = await withInterrupts(runner, () => runner.run(description, { sessionId }));

    console.log(formatRunResult(result, { verbose }));
    process.exitCode = exitCodeFor(result);
  } catch (err) {
    console.error(formatError(errorMessage(err)));
    process.exitCode = 1;
  }
}
