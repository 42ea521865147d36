import { recentToolResults } from '../agent/state';
import type { TaskState } from '../agent/state';

const TACTICS: readonly string[] = [
  'Re-inspect the page to get fresh element references before interacting again.',
  'Close any modal or overlay that may block the page, then retry the interaction.',
  'Scroll the target into view or reach the same content through a different link or search.',
  'Reload the page and wait for the DOM to be ready instead of waiting for network idle.',
  'Navigate directly to a URL that leads to the goal instead of clicking through the interface.',
  'Break the remaining work into smaller steps and verify the page state after each one.',
];

/** Builds the strategy-change message; tactics rotate with each adaptation */
export function proposeStrategy(state: Pick<TaskState, 'history' | 'strategyChanges' | 'errorCount' | 'originalTask'>): string {
  const failures = recentToolResults(state.history, 5)
    .filter((r) => r.status === 'error')
    .map((r) => `${r.name}: ${r.output.slice(0, 120)}`);

  const tactic = TACTICS[state.strategyChanges % TACTICS.length] ?? TACTICS[0];
  const lines = [`Strategy adaptation #${state.strategyChanges + 1}: the current approach is not making progress on "${state.originalTask}".`];
  if (failures.length) {
    lines.push('Recent failures:', ...failures.map((f) => `- ${f}`));
  }
  lines.push(`Try a different approach: ${tactic}`);
  return lines.join('\n');
}
