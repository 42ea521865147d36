import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import type { ActionSchema, ToolExecutor, ToolOutcome } from '../agent/collaborators';
import { ERROR_KINDS } from '../agent/state';
import type { ErrorKind } from '../agent/state';
import { CollaboratorError, errorMessage } from '../agent/errors';
import { silentLogger } from '../utils/logger';
import type { AgentLogger } from '../utils/logger';

interface ToolBridgeResponse {
  output?: string;
  error?: string;
  kind?: string;
}

interface ToolListResponse {
  tools?: ActionSchema[];
}

export interface HttpToolExecutorOptions {
  endpoint: string;
  timeoutMs?: number;
  logger?: AgentLogger;
}

/**
 * Client for a browser tool bridge: `GET /tools` lists the actions and
 * `POST /tools/:name` runs one. Failures come back as error outcomes.
 */
export class HttpToolExecutor implements ToolExecutor {
  private http: AxiosInstance;
  private logger: AgentLogger;

  constructor(options: HttpToolExecutorOptions) {
    this.logger = options.logger ?? silentLogger;
    this.http = axios.create({
      baseURL: options.endpoint,
      timeout: options.timeoutMs ?? 30000,
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true,
    });

    this.http.interceptors.request.use((config) => {
      this.logger.debug(`[Tools] ${config.method?.toUpperCase() ?? 'GET'} ${config.url ?? ''}`);
      return config;
    });
  }

  async listActions(): Promise<ActionSchema[]> {
    let response: AxiosResponse<ToolListResponse>;
    try {
      response = await this.http.get<ToolListResponse>('/tools');
    } catch (error) {
      throw new CollaboratorError(`Network error listing tools: ${errorMessage(error)}`, 0, error);
    }
    if (response.status >= 400) {
      throw new CollaboratorError(`Listing tools failed with status ${response.status}`, response.status);
    }
    return response.data?.tools ?? [];
  }

  async execute(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolOutcome> {
    let response: AxiosResponse<ToolBridgeResponse>;
    try {
      response = await this.http.post<ToolBridgeResponse>(`/tools/${encodeURIComponent(name)}`, { args }, { signal });
    } catch (error) {
      return { error: `Network error: ${errorMessage(error)}`, kind: 'network' };
    }

    const data = response.data ?? {};
    if (response.status >= 400 || data.error !== undefined) {
      const message = data.error ?? `${name} failed with status ${response.status}`;
      return { error: message, kind: toErrorKind(data.kind) ?? kindForStatus(response.status) };
    }
    return { ok: data.output ?? '' };
  }
}

function toErrorKind(value: string | undefined): ErrorKind | undefined {
  return ERROR_KINDS.find((k) => k === value && k !== 'none');
}

function kindForStatus(status: number): ErrorKind | undefined {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  if (status === 502 || status === 503 || status === 504) return 'network';
  return undefined;
}
