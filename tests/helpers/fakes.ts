import type { ActionSchema, HumanInterface, Inference, InferenceOptions, ObservabilitySink, ProgressEvent, ReasoningClient, ToolExecutor, ToolOutcome } from '../../src/agent/collaborators';
import type { Message } from '../../src/agent/state';
import type { NodeContext } from '../../src/nodes/types';
import type { AgentLogger } from '../../src/utils/logger';
import type { SessionRecord, SessionStore } from '../../src/orchestrator/session-store';

// ── Builders ────────────────────────────────────────────────────────────

let callSeq = 0;

export function resetCallIds(): void {
  callSeq = 0;
}

/** One reasoning step requesting the given actions, run one after another */
export function act(...actions: Array<[string, Record<string, unknown>?]>): Extract<Inference, { type: 'actions' }> {
  return {
    type: 'actions',
    actions: actions.map(([name, args]) => ({ id: `call_${++callSeq}`, name, args: args ?? {} })),
    concurrent: false,
  };
}

export function actConcurrently(...actions: Array<[string, Record<string, unknown>?]>): Inference {
  return { ...act(...actions), concurrent: true };
}

export function done(answer: string): Inference {
  return { type: 'complete', answer };
}

export const BROWSER_ACTIONS: ActionSchema[] = [
  { name: 'navigate', description: 'Open a URL', parameters: { type: 'object', properties: { url: { type: 'string' } } } },
  { name: 'extract_title', description: 'Read the page title', parameters: { type: 'object', properties: {} } },
  { name: 'click', description: 'Click an element', parameters: { type: 'object', properties: { ref: { type: 'string' } } } },
  { name: 'submit_form', description: 'Submit a form', parameters: { type: 'object', properties: { ref: { type: 'string' } } } },
];

// ── Collaborators ───────────────────────────────────────────────────────

type ScriptStep = Inference | Error;

/** Replays scripted inferences; once the script runs out, `fallback` answers */
export class ScriptedReasoner implements ReasoningClient {
  readonly calls: Array<{ history: Message[]; options?: InferenceOptions }> = [];

  constructor(
    private script: ScriptStep[],
    private fallback?: () => Inference,
  ) {}

  infer(history: readonly Message[], _actions: readonly ActionSchema[], options?: InferenceOptions): Promise<Inference> {
    this.calls.push({ history: [...history], options });
    const next = this.script.shift() ?? this.fallback?.();
    if (!next) return Promise.reject(new Error('Reasoner script exhausted'));
    if (next instanceof Error) return Promise.reject(next);
    return Promise.resolve(next);
  }
}

type ToolScript = ToolOutcome | ToolOutcome[];

/** Answers per action name; a list is consumed in order and its last entry repeats */
export class ScriptedExecutor implements ToolExecutor {
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];

  constructor(private script: Record<string, ToolScript>) {}

  execute(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    this.calls.push({ name, args });
    const entry = this.script[name];
    if (entry === undefined) return Promise.resolve({ error: `Unknown action: ${name}` });
    if (!Array.isArray(entry)) return Promise.resolve(entry);
    const outcome = entry.length > 1 ? entry.shift() : entry[0];
    return Promise.resolve(outcome ?? { error: `No scripted outcome for ${name}` });
  }
}

export class ScriptedHuman implements HumanInterface {
  readonly prompts: Array<{ prompt: string; options: readonly string[] }> = [];

  constructor(private answers: string[]) {}

  ask(prompt: string, options: readonly string[]): Promise<string> {
    this.prompts.push({ prompt, options });
    const answer = this.answers.shift();
    return answer === undefined ? Promise.reject(new Error('No scripted answer')) : Promise.resolve(answer);
  }
}

export class RecordingSink implements ObservabilitySink {
  readonly events: ProgressEvent[] = [];

  report(event: ProgressEvent): void {
    this.events.push(event);
  }
}

// ── Context ─────────────────────────────────────────────────────────────

export function createSilentLogger(): jest.Mocked<AgentLogger> {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

export function createContext(overrides: Partial<NodeContext> = {}): NodeContext {
  return { signal: new AbortController().signal, logger: createSilentLogger(), ...overrides };
}

// ── Session store ───────────────────────────────────────────────────────

/** In-process stand-in for the file store; records round-trip through JSON */
export class InMemorySessionStore implements SessionStore {
  readonly saves: SessionRecord[] = [];
  private records = new Map<string, string>();

  save(sessionId: string, record: SessionRecord): Promise<void> {
    this.saves.push(record);
    this.records.set(sessionId, JSON.stringify(record));
    return Promise.resolve();
  }

  load(sessionId: string): Promise<SessionRecord | null> {
    const raw = this.records.get(sessionId);
    if (raw === undefined) return Promise.resolve(null);
    const record: SessionRecord = JSON.parse(raw);
    return Promise.resolve(record);
  }

  async list(): Promise<SessionRecord[]> {
    const records = await Promise.all([...this.records.keys()].map((id) => this.load(id)));
    return records.filter((r): r is SessionRecord => r !== null);
  }

  async latest(): Promise<SessionRecord | null> {
    const [first] = await this.list();
    return first ?? null;
  }
}
