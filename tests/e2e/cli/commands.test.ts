import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';
import { createProgram } from '../../../src/cli';
import { FileSessionStore } from '../../../src/orchestrator/session-store';
import { createTaskState } from '../../../src/agent/state';

describe('CLI commands', () => {
  let cwd: string;
  let sessionsDir: string;
  let output: string[];

  const run = async (...args: string[]): Promise<string> => {
    await createProgram().exitOverride().parseAsync(['node', 'autopilot', ...args]);
    return output.join('\n');
  };

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'autopilot-cli-'));
    sessionsDir = path.join(cwd, 'sessions');
    await fs.writeFile(path.join(cwd, 'config.yaml'), `storage:\n  dir: ${JSON.stringify(sessionsDir)}\n`, 'utf8');
    jest.spyOn(process, 'cwd').mockReturnValue(cwd);
    output = [];
    jest.spyOn(console, 'log').mockImplementation((line: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(cwd, { recursive: true, force: true });
  });

  describe('status', () => {
    it('should show the most recently updated session', async () => {
      const store = new FileSessionStore(sessionsDir);
      const base = { status: 'running' as const, createdAt: '2026-01-01T00:00:00.000Z' };
      await store.save('run-old', { ...base, sessionId: 'run-old', updatedAt: '2026-01-01T00:00:00.000Z', state: createTaskState('Old task', { sessionId: 'run-old' }) });
      await store.save('run-new', {
        ...base,
        sessionId: 'run-new',
        status: 'suspended',
        updatedAt: '2026-01-02T00:00:00.000Z',
        state: createTaskState('Submit the contact form', { sessionId: 'run-new' }),
        continuation: { resumeNode: 'human_confirmation', payload: { kind: 'confirmation', message: 'Allow critical action submit_form?', options: ['yes', 'no'] } },
      });

      const text = await run('status');

      expect(text.split('\n')).toEqual([
        '  Session status',
        '  session:   run-new',
        '  task:      Submit the contact form',
        '  status:    suspended',
        '  step:      0',
        '  progress:  0%',
        '  errors:    0',
        '  updatedAt: 2026-01-02T00:00:00.000Z',
        '  waiting:   Allow critical action submit_form?',
      ]);
    });

    it('should print the record as JSON on request', async () => {
      const state = createTaskState('Find the title of example.com', { sessionId: 'run-json' });
      await new FileSessionStore(sessionsDir).save('run-json', { sessionId: 'run-json', status: 'running', createdAt: 'c', updatedAt: 'u', state });

      const text = await run('status', '--session', 'run-json', '--json');

      expect(JSON.parse(text)).toMatchObject({ sessionId: 'run-json', status: 'running', state: { originalTask: 'Find the title of example.com' } });
    });

    it('should say when a session does not exist', async () => {
      expect(await run('status', '--session', 'nope')).toBe('  No state found for session: nope');
    });

    it('should refuse a session id that points outside the sessions directory', async () => {
      const errors: string[] = [];
      jest.spyOn(console, 'error').mockImplementation((line: unknown) => {
        errors.push(String(line));
      });

      expect(await run('status', '--session', '../secrets')).toBe('');
      expect(errors).toEqual(['  Invalid session id: "../secrets"']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('config', () => {
    it('should validate the merged configuration', async () => {
      expect(await run('config', 'validate')).toBe('  ✓ Configuration is valid.');
    });

    it('should list every problem in an invalid configuration', async () => {
      await fs.writeFile(path.join(cwd, 'config.yaml'), 'agent:\n  quality_threshold: 2\n', 'utf8');

      const text = await run('config', 'validate');

      expect(text.split('\n')).toEqual(['  ✗ Configuration is invalid:', '    - agent.quality_threshold: Number must be less than or equal to 1']);
      expect(process.exitCode).toBe(1);
    });

    it('should mask the api key when showing the configuration', async () => {
      await fs.writeFile(path.join(cwd, 'config.yaml'), `storage:\n  dir: ${JSON.stringify(sessionsDir)}\nllm:\n  api_key: test-secret\n`, 'utf8');

      const shown = JSON.parse(await run('config', 'show'));

      expect(shown.llm.api_key).toBe('********');
      expect(shown.storage.dir).toBe(sessionsDir);
    });
  });
});
