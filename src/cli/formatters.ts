import chalk from 'chalk';
import type { ProgressEvent } from '../agent/collaborators';
import type { InterruptPayload, NodeId } from '../agent/transition';
import type { RunResult } from '../orchestrator/agent-runner';
import type { SessionRecord } from '../orchestrator/session-store';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Loop progress ───────────────────────────────────────────────────────

const NODE_LABELS: Record<NodeId, string> = {
  reasoning: 'Thinking...',
  validator: 'Checking critical action...',
  human_confirmation: 'Waiting for you...',
  tool_execution: 'Running actions...',
  self_corrector: 'Correcting a stale reference...',
  progress_analyzer: 'Analyzing progress...',
  strategy_adapter: 'Changing strategy...',
  quality_evaluator: 'Evaluating the answer...',
  goal_validator: 'Validating the goal...',
  memory_manager: 'Compacting memory...',
  progress_reporter: 'Reporting progress...',
};

export function formatTransition(from: NodeId, to: NodeId, step: number): string {
  return chalk.cyan(`  [${step}] ${from} -> ${to} ${NODE_LABELS[to]}`);
}

export function formatProgress(event: ProgressEvent): string {
  const pct = `${Math.round(event.progressScore * 100)}%`;
  const last = event.lastAction ? `, last: ${event.lastAction}` : '';
  return chalk.blue(`  Progress ${pct} (${event.status}) at step ${event.step}${last}`);
}

export function formatInterrupt(payload: InterruptPayload): string {
  const title = payload.kind === 'confirmation' ? 'Confirmation required' : 'Question';
  return `${chalk.yellow.bold(title)}\n  ${payload.message}`;
}

// ── Final result ────────────────────────────────────────────────────────

export function formatRunResult(result: RunResult, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (result.status === 'completed') {
    lines.push(chalk.green.bold('Task completed successfully.'));
  } else if (result.status === 'cancelled') {
    lines.push(chalk.yellow.bold('Task cancelled.'));
  } else if (result.status === 'suspended') {
    lines.push(chalk.yellow.bold('Task suspended, waiting for input.'));
  } else {
    lines.push(chalk.red.bold('Task failed.'));
  }

  lines.push(formatInfo(`Session:   ${result.sessionId}`));
  lines.push(formatInfo(`Steps:     ${result.steps}`));
  lines.push(formatInfo(`Duration:  ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.outcome?.status === 'failure') {
    lines.push(formatError(`Reason: ${result.outcome.reason}`));
    if (result.outcome.detail && opts?.verbose) {
      lines.push(formatInfo(`Details: ${result.outcome.detail}`));
    }
  }
  if (result.pending) {
    lines.push(formatWarning(`Pending: ${result.pending.message}`));
    lines.push(formatInfo(`Resume with: autopilot resume ${result.sessionId}`));
  }
  if (result.answer) {
    lines.push('', chalk.bold('Answer:'), result.answer);
  }

  return lines.join('\n');
}

export function formatSession(record: SessionRecord): string {
  const { state } = record;
  const lines = [
    formatSuccess('Session status'),
    formatInfo(`session:   ${record.sessionId}`),
    formatInfo(`task:      ${state.originalTask}`),
    formatInfo(`status:    ${record.status}`),
    formatInfo(`step:      ${state.step}`),
    formatInfo(`progress:  ${Math.round(state.progressScore * 100)}%`),
    formatInfo(`errors:    ${state.errorCount}`),
    formatInfo(`updatedAt: ${record.updatedAt}`),
  ];
  if (record.continuation) {
    lines.push(formatWarning(`waiting:   ${record.continuation.payload.message}`));
  }
  if (record.outcome) {
    const outcome = record.outcome;
    lines.push(outcome.status === 'success' ? formatSuccess(`outcome:   ${outcome.reason}`) : formatError(`outcome:   ${outcome.reason}`));
  }
  return lines.join('\n');
}
