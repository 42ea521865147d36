import { Command } from 'commander';
import { loadConfig, maskConfig } from '../../config/loader';
import { ConfigValidationError, errorMessage } from '../../agent/errors';
import { formatError, formatSuccess } from '../formatters';

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Inspect configuration');

  configCommand
    .command('validate')
    .description('Validate the merged configuration (defaults, config.yaml, environment)')
    .action(() => {
      try {
        loadConfig();
        console.log(formatSuccess('✓ Configuration is valid.'));
      } catch (error) {
        if (error instanceof ConfigValidationError) {
          console.log(formatError('✗ Configuration is invalid:'));
          error.issues.forEach((issue) => console.log(formatError(`  - ${issue}`)));
        } else {
          console.error(formatError(`Failed to load configuration: ${errorMessage(error)}`));
        }
        process.exitCode = 1;
      }
    });

  configCommand
    .command('show')
    .description('Show the merged configuration with secrets masked')
    .action(() => {
      try {
        console.log(JSON.stringify(maskConfig(loadConfig()), null, 2));
      } catch (error) {
        console.error(formatError(errorMessage(error)));
        process.exitCode = 1;
      }
    });
}
