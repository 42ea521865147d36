import { describe, it, expect, beforeAll } from '@jest/globals';
import chalk from 'chalk';
import { formatInterrupt, formatProgress, formatRunResult, formatSession, formatTransition } from '../../../src/cli/formatters';
import { exitCodeFor } from '../../../src/cli/commands/run';
import { createTaskState } from '../../../src/agent/state';
import type { RunResult } from '../../../src/orchestrator/agent-runner';

describe('formatters', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  const state = createTaskState('Find the title of example.com', { sessionId: 's-1' });

  const result = (overrides: Partial<RunResult>): RunResult => ({ status: 'completed', sessionId: 's-1', steps: 8, state, durationMs: 1500, ...overrides });

  it('should describe a transition with the label of the next node', () => {
    expect(formatTransition('tool_execution', 'self_corrector', 2)).toBe('  [2] tool_execution -> self_corrector Correcting a stale reference...');
  });

  it('should show progress as a percentage', () => {
    const line = formatProgress({
      sessionId: 's-1',
      step: 4,
      lastAction: 'extract_title',
      progressScore: 0.65,
      status: 'Making good progress',
      errorCount: 0,
      timestamp: '2026-01-01T00:00:00.000Z',
    });

    expect(line).toBe('  Progress 65% (Making good progress) at step 4, last: extract_title');
  });

  it('should title interrupts by kind', () => {
    expect(formatInterrupt({ kind: 'question', message: 'Which size?', options: ['S', 'M'] })).toBe('Question\n  Which size?');
  });

  it('should print the answer of a completed task', () => {
    const text = formatRunResult(result({ answer: 'The title is "Example Domain"' }));

    expect(text.split('\n')).toEqual([
      '',
      'Task completed successfully.',
      '  Session:   s-1',
      '  Steps:     8',
      '  Duration:  1.5s',
      '',
      'Answer:',
      'The title is "Example Domain"',
    ]);
  });

  it('should print the failure reason and, when verbose, the details', () => {
    const failed = result({ status: 'failed', steps: 30, outcome: { status: 'failure', reason: 'step_limit_exceeded', detail: 'Stopped after 30 steps' } });

    expect(formatRunResult(failed).split('\n').slice(1)).toEqual(['Task failed.', '  Session:   s-1', '  Steps:     30', '  Duration:  1.5s', '  Reason: step_limit_exceeded']);
    expect(formatRunResult(failed, { verbose: true }).split('\n').pop()).toBe('  Details: Stopped after 30 steps');
  });

  it('should explain how to resume a suspended task', () => {
    const suspended = result({ status: 'suspended', steps: 2, pending: { kind: 'confirmation', message: 'Allow critical action submit_form?', options: ['yes', 'no'] } });

    expect(formatRunResult(suspended).split('\n').slice(-2)).toEqual(['  Pending: Allow critical action submit_form?', '  Resume with: autopilot resume s-1']);
  });

  it('should summarize a stored session', () => {
    const text = formatSession({ sessionId: 's-1', status: 'running', createdAt: '2026-01-01T00:00:00.000Z', updatedAt: '2026-01-01T00:00:09.000Z', state });

    expect(text.split('\n')).toEqual([
      '  Session status',
      '  session:   s-1',
      '  task:      Find the title of example.com',
      '  status:    running',
      '  step:      0',
      '  progress:  0%',
      '  errors:    0',
      '  updatedAt: 2026-01-01T00:00:09.000Z',
    ]);
  });

  it('should exit non-zero only for failed or cancelled runs', () => {
    expect(exitCodeFor(result({}))).toBe(0);
    expect(exitCodeFor(result({ status: 'suspended' }))).toBe(0);
    expect(exitCodeFor(result({ status: 'cancelled' }))).toBe(1);
    expect(exitCodeFor(result({ status: 'failed' }))).toBe(1);
  });
});
