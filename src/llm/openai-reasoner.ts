import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import type { ActionSchema, Inference, InferenceOptions, ReasoningClient } from '../agent/collaborators';
import type { ActionRequest, Message } from '../agent/state';
import { CollaboratorError, errorMessage } from '../agent/errors';
import { silentLogger } from '../utils/logger';
import type { AgentLogger } from '../utils/logger';

// ── Wire types ──────────────────────────────────────────────────────────

export interface ChatToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: ChatToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface ChatTool {
  type: 'function';
  function: ActionSchema;
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null; tool_calls?: ChatToolCall[] } }>;
  error?: { message?: string };
}

export interface OpenAIReasonerOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  timeoutMs?: number;
  /** Actions that only read the page; a batch made only of these runs concurrently */
  readOnlyActions?: readonly string[];
  logger?: AgentLogger;
}

export const DEFAULT_READ_ONLY_ACTIONS: readonly string[] = ['extract_text', 'extract_title', 'get_page_info', 'explore_page', 'list_tabs', 'take_screenshot'];

// ── Client ──────────────────────────────────────────────────────────────

/** Reasoning client for any OpenAI-compatible `/chat/completions` endpoint */
export class OpenAIReasoner implements ReasoningClient {
  private http: AxiosInstance;
  private readOnly: Set<string>;
  private logger: AgentLogger;

  constructor(private options: OpenAIReasonerOptions) {
    this.readOnly = new Set(options.readOnlyActions ?? DEFAULT_READ_ONLY_ACTIONS);
    this.logger = options.logger ?? silentLogger;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 60000,
      headers: {
        'Content-Type': 'application/json',
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
      // Status codes are mapped to errors below.
      validateStatus: () => true,
    });

    this.http.interceptors.request.use((config) => {
      this.logger.debug(`[LLM] ${config.method?.toUpperCase() ?? 'POST'} ${config.url ?? ''}`);
      return config;
    });
  }

  async infer(history: readonly Message[], availableActions: readonly ActionSchema[], options: InferenceOptions = {}): Promise<Inference> {
    const messages = toChatMessages(history);
    if (options.guidance) messages.unshift({ role: 'system', content: options.guidance });

    const body = {
      model: this.options.model,
      temperature: this.options.temperature ?? 0.2,
      messages,
      ...(availableActions.length ? { tools: availableActions.map(toChatTool) } : {}),
    };

    let response: AxiosResponse<ChatCompletionResponse>;
    try {
      response = await this.http.post<ChatCompletionResponse>('/chat/completions', body, { signal: options.signal });
    } catch (error) {
      throw new CollaboratorError(`Network error calling reasoning engine: ${errorMessage(error)}`, 0, error);
    }

    if (response.status >= 400) {
      const detail = response.data?.error?.message ?? response.statusText;
      throw new CollaboratorError(`Reasoning request failed with status ${response.status}: ${detail}`, response.status);
    }

    const message = response.data?.choices?.[0]?.message;
    if (!message) {
      throw new CollaboratorError('Reasoning engine returned no choices', response.status);
    }

    const calls = message.tool_calls ?? [];
    if (calls.length === 0) {
      return { type: 'complete', answer: message.content?.trim() ?? '' };
    }

    const actions = calls.map(toActionRequest);
    return {
      type: 'actions',
      content: message.content ?? undefined,
      actions,
      concurrent: actions.length > 1 && actions.every((a) => this.readOnly.has(a.name)),
    };
  }
}

// ── Mapping ─────────────────────────────────────────────────────────────

function toChatTool(schema: ActionSchema): ChatTool {
  return { type: 'function', function: { name: schema.name, description: schema.description, parameters: schema.parameters } };
}

function toActionRequest(call: ChatToolCall): ActionRequest {
  let args: unknown;
  try {
    args = call.function.arguments ? JSON.parse(call.function.arguments) : {};
  } catch (error) {
    throw new CollaboratorError(`Malformed arguments for ${call.function.name}: ${errorMessage(error)}`, undefined, error);
  }
  if (typeof args !== 'object' || args === null || Array.isArray(args)) {
    throw new CollaboratorError(`Arguments for ${call.function.name} must be an object`);
  }
  return { id: call.id, name: call.function.name, args: Object.fromEntries(Object.entries(args)) };
}

/**
 * Maps history to chat messages. A tool call is only sent when its result is
 * present (compaction may have dropped one side of the pair); unmatched results
 * are sent as plain user text.
 */
export function toChatMessages(history: readonly Message[]): ChatMessage[] {
  const answered = new Set(history.flatMap((m) => (m.result ? [m.result.actionId] : [])));
  const called = new Set<string>();
  const out: ChatMessage[] = [];

  for (const message of history) {
    switch (message.role) {
      case 'system':
        out.push({ role: 'system', content: message.content });
        break;
      case 'user':
        out.push({ role: 'user', content: message.content });
        break;
      case 'assistant': {
        const calls = (message.actions ?? []).filter((a) => answered.has(a.id));
        if (calls.length === 0) {
          out.push({ role: 'assistant', content: message.content || describeRequested(message) });
          break;
        }
        for (const a of calls) called.add(a.id);
        out.push({
          role: 'assistant',
          content: message.content || null,
          tool_calls: calls.map((a): ChatToolCall => ({ id: a.id, type: 'function', function: { name: a.name, arguments: JSON.stringify(a.args) } })),
        });
        break;
      }
      case 'tool': {
        const result = message.result;
        if (result && called.has(result.actionId)) {
          out.push({ role: 'tool', tool_call_id: result.actionId, content: message.content });
        } else {
          out.push({ role: 'user', content: `Result of ${result?.name ?? 'action'}: ${message.content}` });
        }
        break;
      }
    }
  }
  return out;
}

function describeRequested(message: Message): string {
  const names = (message.actions ?? []).map((a) => a.name);
  return names.length ? `Requested: ${names.join(', ')}` : '';
}
