import type { Compaction, Message, SummaryContext } from '../agent/state';

export interface CompactorOptions {
  /** Hard ceiling for the history size estimate */
  maxTokens: number;
  /** Compaction starts above this value; must stay below maxTokens */
  preThreshold: number;
  keepRecent: number;
  maxSummaryTokens: number;
}

export const DEFAULT_COMPACTOR_OPTIONS: CompactorOptions = {
  maxTokens: 20000,
  preThreshold: 16000,
  keepRecent: 6,
  maxSummaryTokens: 1200,
};

export interface Summarizer {
  summarize(previous: string | undefined, messages: readonly Message[], maxTokens: number): Promise<string>;
}

const PER_MESSAGE_OVERHEAD = 4;
const SUMMARY_HEADER = 'Summary of earlier steps:\n';
export const SUMMARY_MARGIN = 16;
const TASK_LINE = '- task:';

export function estimateTextTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function estimateMessageTokens(message: Message): number {
  const actions = message.actions?.length ? estimateTextTokens(JSON.stringify(message.actions)) : 0;
  return estimateTextTokens(message.content) + actions + PER_MESSAGE_OVERHEAD;
}

/** Approximate token count of a history */
export function estimateTokens(history: readonly Message[]): number {
  return history.reduce((sum, m) => sum + estimateMessageTokens(m), 0);
}

/** Keeps one line per message, dropping the oldest lines once over budget */
export class ExtractiveSummarizer implements Summarizer {
  constructor(private lineLength = 160) {}

  summarize(previous: string | undefined, messages: readonly Message[], maxTokens: number): Promise<string> {
    const lines = previous ? previous.split('\n').filter(Boolean) : [];
    for (const message of messages) {
      if (message.kind === 'summary') continue;
      lines.push(this.line(message));
    }

    // The task line survives trimming; older step lines go first.
    const pinned = lines.filter((l) => l.startsWith(TASK_LINE));
    const steps = lines.filter((l) => !l.startsWith(TASK_LINE));
    while (steps.length > 1 && estimateTextTokens([...pinned, ...steps].join('\n')) > maxTokens) {
      steps.shift();
    }
    const text = [...pinned, ...steps].join('\n');
    if (estimateTextTokens(text) <= maxTokens) return Promise.resolve(text);

    // Still over: cut the front of the step lines, never the task line.
    const head = pinned.join('\n');
    const room = maxTokens * 4 - head.length - 1;
    if (!head || room <= 0) return Promise.resolve(text.slice(text.length - maxTokens * 4));
    const rest = steps.join('\n');
    return Promise.resolve(`${head}\n${rest.slice(rest.length - room)}`);
  }

  private line(message: Message): string {
    const content = message.content.replace(/\s+/g, ' ').trim();
    const clipped = content.length > this.lineLength ? `${content.slice(0, this.lineLength - 3)}...` : content;
    if (message.result) {
      return `- ${message.result.name} ${message.result.status}: ${clipped}`;
    }
    if (message.actions?.length) {
      const names = message.actions.map((a) => a.name).join(', ');
      return `- requested ${names}${clipped ? `: ${clipped}` : ''}`;
    }
    return `- ${message.kind}: ${clipped}`;
  }
}

/**
 * Replaces all but the most recent messages with a running summary once the
 * size estimate crosses the pre-threshold.
 */
export class HistoryCompactor {
  readonly options: CompactorOptions;

  constructor(
    options: Partial<CompactorOptions> = {},
    private summarizer: Summarizer = new ExtractiveSummarizer(),
  ) {
    this.options = { ...DEFAULT_COMPACTOR_OPTIONS, ...options };
    if (this.options.preThreshold >= this.options.maxTokens) {
      throw new Error(`preThreshold (${this.options.preThreshold}) must be below maxTokens (${this.options.maxTokens})`);
    }
    if (this.options.maxSummaryTokens + SUMMARY_MARGIN >= this.options.preThreshold) {
      throw new Error(`maxSummaryTokens (${this.options.maxSummaryTokens}) leaves no room below preThreshold (${this.options.preThreshold})`);
    }
    if (this.options.keepRecent < 1) {
      throw new Error('keepRecent must be at least 1');
    }
  }

  needsCompaction(history: readonly Message[]): boolean {
    return estimateTokens(history) > this.options.preThreshold;
  }

  /** Returns null when the history is under the pre-threshold or nothing besides the summary can be folded */
  async compact(history: readonly Message[], current: SummaryContext | null): Promise<Compaction | null> {
    if (!this.needsCompaction(history)) return null;

    // The compacted history has to land back under the pre-threshold, summary message included
    const budget = this.options.preThreshold - this.options.maxSummaryTokens - SUMMARY_MARGIN;
    let cut = this.tailStart(history);
    while (cut < history.length - 1 && estimateTokens(history.slice(cut)) >= budget) {
      cut += 1;
    }
    if (cut === 0) return null;

    const folded = history.slice(0, cut);
    const tail = history.slice(cut);
    const boundaryMessage = folded[folded.length - 1];
    if (!boundaryMessage) return null;
    // Nothing new to fold: only the previous summary sits in front of the tail.
    if (folded.every((m) => m.kind === 'summary')) return null;

    const summary = await this.summarizer.summarize(current?.summary, folded, this.options.maxSummaryTokens);
    const compactions = (current?.compactions ?? 0) + 1;
    const summaryMessage: Message = {
      id: `s${compactions}`,
      role: 'system',
      kind: 'summary',
      content: `${SUMMARY_HEADER}${summary}`,
    };

    return {
      history: [summaryMessage, ...tail],
      summaryContext: { summary, boundary: boundaryMessage.id, compactions },
    };
  }

  /** Start of the retained tail, moved back so it never opens on an orphan tool result */
  private tailStart(history: readonly Message[]): number {
    let cut = Math.max(0, history.length - this.options.keepRecent);
    while (cut > 0 && history[cut]?.role === 'tool') {
      cut -= 1;
    }
    return cut;
  }
}
