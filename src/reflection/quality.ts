import { latestAnswer, recentToolResults } from '../agent/state';
import type { TaskState } from '../agent/state';

export interface QualityVerdict {
  score: number;
  feedback?: string;
}

export interface QualityJudge {
  evaluate(state: Readonly<TaskState>): Promise<QualityVerdict>;
}

const HEDGING = ["i couldn't", 'i could not', 'unable to', 'not sure', 'i was not able', "i wasn't able", 'failed to', 'cannot determine'];

/** Scores the final answer: presence, tool-backed evidence, and absence of hedging */
export class HeuristicQualityJudge implements QualityJudge {
  constructor(private evidenceWindow = 50) {}

  evaluate(state: Readonly<TaskState>): Promise<QualityVerdict> {
    const answer = latestAnswer(state.history)?.trim() ?? '';
    const problems: string[] = [];
    let score = 0;

    if (answer) score += 0.4;
    else problems.push('no final answer was given');

    const evidence = recentToolResults(state.history, this.evidenceWindow).some((r) => r.status === 'ok');
    if (evidence) score += 0.3;
    else problems.push('no successful tool result backs the answer');

    const lower = answer.toLowerCase();
    const hedge = HEDGING.find((h) => lower.includes(h));
    if (answer && !hedge) score += 0.3;
    else if (hedge) problems.push(`the answer is hedged ("${hedge}")`);

    const rounded = Math.round(score * 10) / 10;
    return Promise.resolve(problems.length ? { score: rounded, feedback: `Quality evaluation: ${problems.join('; ')}. Complete the task and state the concrete result.` } : { score: rounded });
  }
}
