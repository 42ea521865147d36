import crypto from 'crypto';

export type ErrorKind = 'none' | 'network' | 'element_not_found' | 'stale_ref' | 'auth' | 'rate_limit' | 'captcha' | 'unknown';

export const ERROR_KINDS: readonly ErrorKind[] = ['none', 'network', 'element_not_found', 'stale_ref', 'auth', 'rate_limit', 'captcha', 'unknown'];

export type MessageRole = 'user' | 'assistant' | 'tool' | 'system';

/** Purpose tag carried by every history entry */
export type MessageKind = 'task' | 'reasoning' | 'answer' | 'tool_result' | 'feedback' | 'correction' | 'strategy' | 'summary' | 'abort';

export interface ActionRequest {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

/** A set of actions requested by one reasoning step */
export interface ActionBatch {
  actions: ActionRequest[];
  /** Static hint from the reasoning step: true when the actions are independent */
  concurrent: boolean;
}

export type ActionStatus = 'ok' | 'error' | 'skipped' | 'aborted';

export interface ActionResult {
  actionId: string;
  name: string;
  status: ActionStatus;
  output: string;
  kind?: ErrorKind;
}

export interface Message {
  id: string;
  role: MessageRole;
  kind: MessageKind;
  content: string;
  actions?: ActionRequest[];
  result?: ActionResult;
}

export type MessageDraft = Omit<Message, 'id'>;

export interface PendingAction {
  name: string;
  args: Record<string, unknown>;
}

export interface SummaryContext {
  summary: string;
  /** Id of the last message folded into the summary */
  boundary: string;
  compactions: number;
}

export interface TaskState {
  sessionId: string;
  readonly originalTask: string;
  complex: boolean;
  history: Message[];
  messageSeq: number;
  step: number;
  pendingAction: PendingAction | null;
  pendingBatch: ActionBatch | null;
  needsValidation: boolean;
  validationPassed: boolean;
  requiresHumanApproval: boolean;
  progressScore: number;
  qualityScore: number | null;
  errorCount: number;
  stuckCounter: number;
  strategyChanges: number;
  errorType: ErrorKind;
  lastError: { kind: ErrorKind; message: string } | null;
  goalAchieved: boolean;
  summaryContext: SummaryContext | null;
  lastNode: string | null;
}

/** Fields a node may overwrite directly */
export type StatePatch = Partial<
  Pick<
    TaskState,
    | 'pendingAction'
    | 'pendingBatch'
    | 'needsValidation'
    | 'validationPassed'
    | 'requiresHumanApproval'
    | 'progressScore'
    | 'qualityScore'
    | 'errorCount'
    | 'stuckCounter'
    | 'strategyChanges'
    | 'errorType'
    | 'lastError'
    | 'goalAchieved'
  >
>;

export interface Compaction {
  history: Message[];
  summaryContext: SummaryContext;
}

export interface StateDelta {
  patch?: StatePatch;
  messages?: MessageDraft[];
  compaction?: Compaction;
}

export interface CreateTaskStateOptions {
  sessionId?: string;
  complex?: boolean;
}

const SEQUENCING_PATTERN = /\b(then|after that|afterwards|and also|finally)\b|;/i;

/** Heuristic used when the caller does not flag the task explicitly */
export function isComplexTask(task: string): boolean {
  const words = task.trim().split(/\s+/).filter(Boolean);
  const sentences = task.split(/[.!?]+(?:\s+|$)/).filter((s) => s.trim().length > 0);
  return words.length > 12 || sentences.length > 1 || SEQUENCING_PATTERN.test(task);
}

export function createTaskState(originalTask: string, options: CreateTaskStateOptions = {}): TaskState {
  const task = originalTask.trim();
  if (!task) throw new Error('Task description must not be empty');

  const state: TaskState = {
    sessionId: options.sessionId ?? crypto.randomUUID(),
    originalTask: task,
    complex: options.complex ?? isComplexTask(task),
    history: [],
    messageSeq: 0,
    step: 0,
    pendingAction: null,
    pendingBatch: null,
    needsValidation: false,
    validationPassed: false,
    requiresHumanApproval: false,
    progressScore: 0,
    qualityScore: null,
    errorCount: 0,
    stuckCounter: 0,
    strategyChanges: 0,
    errorType: 'none',
    lastError: null,
    goalAchieved: false,
    summaryContext: null,
    lastNode: null,
  };

  return applyDelta(state, { messages: [{ role: 'user', kind: 'task', content: task }] });
}

/**
 * Returns a new state with the delta applied. Appended messages get sequential
 * ids in request order; a compaction must keep a suffix of the current history.
 */
export function applyDelta(state: TaskState, delta: StateDelta): TaskState {
  let history = state.history;
  let summaryContext = state.summaryContext;
  let messageSeq = state.messageSeq;

  if (delta.compaction) {
    assertRetainedSuffix(history, delta.compaction.history);
    history = delta.compaction.history;
    summaryContext = delta.compaction.summaryContext;
  }

  if (delta.messages?.length) {
    const appended = delta.messages.map((draft) => {
      messageSeq += 1;
      return { ...draft, id: `m${messageSeq}` };
    });
    history = [...history, ...appended];
  }

  return {
    ...state,
    ...delta.patch,
    history,
    summaryContext,
    messageSeq,
  };
}

function assertRetainedSuffix(current: Message[], next: Message[]): void {
  // Summary entries are synthesized; everything else must be a tail of the old history.
  const retained = next.filter((m) => m.kind !== 'summary');
  const tail = current.slice(current.length - retained.length);
  const matches = retained.length <= current.length && retained.every((m, i) => tail[i]?.id === m.id);
  if (!matches) {
    throw new Error('Compaction must preserve a contiguous suffix of the history');
  }
}

/** The most recent tool results, oldest first */
export function recentToolResults(history: readonly Message[], limit: number): ActionResult[] {
  const results: ActionResult[] = [];
  for (let i = history.length - 1; i >= 0 && results.length < limit; i--) {
    const result = history[i]?.result;
    if (result) results.unshift(result);
  }
  return results;
}

/** Content of the latest answer message, if the reasoning step has signalled completion */
export function latestAnswer(history: readonly Message[]): string | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (message?.kind === 'answer') return message.content;
  }
  return undefined;
}

export function describeAction(action: PendingAction): string {
  const args = Object.keys(action.args).length ? ` ${JSON.stringify(action.args)}` : '';
  return `${action.name}${args}`;
}
