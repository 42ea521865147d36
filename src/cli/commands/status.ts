import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { FileSessionStore } from '../../orchestrator/session-store';
import type { SessionRecord, SessionStore } from '../../orchestrator/session-store';
import { errorMessage } from '../../agent/errors';
import { formatError, formatInfo, formatSession } from '../formatters';
import { validateSessionId } from '../validators';

type StatusCommandOptions = {
  session?: string;
  json?: boolean;
};

export async function resolveSession(store: SessionStore, sessionId?: string): Promise<SessionRecord | null> {
  return sessionId ? store.load(sessionId) : store.latest();
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the state of the latest (or a given) session')
    .option('--session <id>', 'Show status for a specific session id')
    .option('--json', 'Output status as JSON', false)
    .action(async (options: StatusCommandOptions) => {
      try {
        const sessionId = options.session ? validateSessionId(options.session) : undefined;
        const config = loadConfig();
        const store = new FileSessionStore(config.storage.dir);
        const record = await resolveSession(store, sessionId);

        if (!record) {
          const msg = options.session ? `No state found for session: ${options.session}` : 'No session state found.';
          console.log(formatInfo(msg));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(record, null, 2));
          return;
        }

        console.log(formatSession(record));
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
