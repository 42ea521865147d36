#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';

export function createProgram(): Command {
  const program = new Command();
  program.name('autopilot').description('Autonomous browser agent with explicit routing').version('0.1.0').option('--verbose', 'Show detailed output for every command');
  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
