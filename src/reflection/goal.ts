import { latestAnswer } from '../agent/state';
import type { ActionResult, TaskState } from '../agent/state';

export type TaskType = 'action' | 'research';

export interface GoalVerdict {
  achieved: boolean;
  /** Evidence on success, gap description otherwise */
  explanation: string;
}

export interface GoalJudge {
  validate(state: Readonly<TaskState>): Promise<GoalVerdict>;
}

const ACTION_VERBS = /\b(add|create|send|delete|remove|buy|book|order|submit|post|fill|subscribe|cancel|reply|move|upload|write|publish|register|sign up)\b/i;

const ACTION_ONLY = ['clicked', 'filled', 'navigated', 'searched', 'added to cart', 'submitted', 'pressed', 'typed'];

const VERIFICATION = ['verified', 'confirmed', 'checked', 'shows', 'displays', 'contains', 'state:', 'result:', 'found that', 'observed', 'current state', 'final state'];

export function detectTaskType(task: string): TaskType {
  return ACTION_VERBS.test(task) ? 'action' : 'research';
}

/** Quoted fragments in the answer, treated as claimed facts */
export function quotedFacts(answer: string): string[] {
  const facts: string[] = [];
  for (const match of answer.matchAll(/["“]([^"”]{2,})["”]/g)) {
    const fact = match[1]?.trim();
    if (fact) facts.push(fact);
  }
  return facts;
}

/**
 * Checks the answer against the tool evidence: it needs at least one successful
 * tool result, every quoted fact must appear in some result, and action tasks
 * need a verification of the final state rather than a list of clicks.
 */
export class HeuristicGoalJudge implements GoalJudge {
  validate(state: Readonly<TaskState>): Promise<GoalVerdict> {
    return Promise.resolve(this.judge(state));
  }

  private judge(state: Readonly<TaskState>): GoalVerdict {
    const answer = latestAnswer(state.history) ?? '';
    const evidence = state.history.map((m) => m.result).filter((r): r is ActionResult => r?.status === 'ok');

    if (evidence.length === 0) {
      return { achieved: false, explanation: 'Goal validation: no successful tool result supports completion. Gather the requested information with the available tools first.' };
    }

    const corpus = evidence.map((r) => r.output.toLowerCase());
    const unsupported = quotedFacts(answer).filter((fact) => !corpus.some((text) => text.includes(fact.toLowerCase())));
    if (unsupported.length) {
      return {
        achieved: false,
        explanation: `Data integrity issue: ${unsupported.map((f) => `"${f}"`).join(', ')} not found in tool results. Re-extract the data and report only verified information.`,
      };
    }

    const lower = answer.toLowerCase();
    if (detectTaskType(state.originalTask) === 'action') {
      const narratesActions = ACTION_ONLY.some((p) => lower.includes(p));
      const verified = VERIFICATION.some((p) => lower.includes(p));
      if (narratesActions && !verified) {
        return {
          achieved: false,
          explanation: 'Task involves state changes. Before completing, verify the final state: check that the expected changes actually occurred, not only that actions were performed.',
        };
      }
    }

    return { achieved: true, explanation: answer || `Completed with ${evidence.length} successful action(s)` };
  }
}
