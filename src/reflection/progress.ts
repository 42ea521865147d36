import { recentToolResults } from '../agent/state';
import type { TaskState } from '../agent/state';

export interface ProgressOptions {
  /** How many recent tool results feed the success rate */
  window: number;
  /** History length at which the depth component saturates */
  depthSaturation: number;
}

export const DEFAULT_PROGRESS_OPTIONS: ProgressOptions = { window: 10, depthSaturation: 40 };

export interface ProgressEstimate {
  score: number;
  successRate: number;
  depth: number;
  errorPenalty: number;
  qualityBonus: number;
}

/**
 * Heuristic progress estimate in [0, 1]: half from the recent tool success rate,
 * half from history depth, minus a capped error penalty, plus a quality bonus.
 */
export function estimateProgress(state: Pick<TaskState, 'history' | 'errorCount' | 'qualityScore'>, options: ProgressOptions = DEFAULT_PROGRESS_OPTIONS): ProgressEstimate {
  const results = recentToolResults(state.history, options.window).filter((r) => r.status === 'ok' || r.status === 'error');
  const succeeded = results.filter((r) => r.status === 'ok').length;
  const successRate = results.length > 0 ? succeeded / results.length : 0;

  const depth = Math.min(state.history.length / options.depthSaturation, 0.5);
  const errorPenalty = Math.min(state.errorCount * 0.1, 0.4);
  const qualityBonus = (state.qualityScore ?? 0.5) * 0.2;

  const score = clamp(successRate * 0.5 + depth - errorPenalty + qualityBonus);
  return { score, successRate, depth, errorPenalty, qualityBonus };
}

/** Label shown to the user for a progress score */
export function progressStatus(score: number): string {
  if (score >= 0.9) return 'Near completion';
  if (score >= 0.6) return 'Making good progress';
  if (score >= 0.3) return 'Working on task';
  return 'Starting out';
}

function clamp(value: number): number {
  return Math.max(0, Math.min(1, value));
}
