import fs from 'fs/promises';
import path from 'path';
import type { TaskState } from '../agent/state';
import type { InterruptPayload, NodeId, Outcome } from '../agent/transition';
import { AgentError } from '../agent/errors';

export type SessionStatus = 'running' | 'suspended' | 'succeeded' | 'failed';

const SESSION_STATUSES: readonly SessionStatus[] = ['running', 'suspended', 'succeeded', 'failed'];

/** What is persisted per session; a suspended record carries its continuation */
export interface SessionRecord {
  sessionId: string;
  status: SessionStatus;
  createdAt: string;
  updatedAt: string;
  state: TaskState;
  /** Node the loop was about to run when the record was written */
  nextNode?: NodeId;
  continuation?: { resumeNode: NodeId; payload: InterruptPayload };
  outcome?: Outcome;
}

export interface SessionStore {
  save(sessionId: string, record: SessionRecord): Promise<void>;
  load(sessionId: string): Promise<SessionRecord | null>;
  list(): Promise<SessionRecord[]>;
  latest(): Promise<SessionRecord | null>;
}

export const DEFAULT_SESSION_DIR = '.autopilot';

/** One JSON file per session: `<rootDir>/<sessionId>/state.json` */
export class FileSessionStore implements SessionStore {
  constructor(private rootDir: string = DEFAULT_SESSION_DIR) {}

  private statePath(sessionId: string): string {
    return path.join(this.rootDir, sessionId, 'state.json');
  }

  async save(sessionId: string, record: SessionRecord): Promise<void> {
    const file = this.statePath(sessionId);
    await fs.mkdir(path.dirname(file), { recursive: true });
    // Write-then-rename so a crash never leaves a truncated record behind.
    const tmp = `${file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(record, null, 2), 'utf-8');
    await fs.rename(tmp, file);
  }

  async load(sessionId: string): Promise<SessionRecord | null> {
    let data: string;
    try {
      data = await fs.readFile(this.statePath(sessionId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new AgentError(`Session ${sessionId} has a corrupt state file`, 'SESSION_CORRUPT', error);
    }
    if (!isSessionRecord(parsed)) {
      throw new AgentError(`Session ${sessionId} has an unrecognised state file`, 'SESSION_CORRUPT');
    }
    return parsed;
  }

  /** All readable sessions, most recently updated first */
  async list(): Promise<SessionRecord[]> {
    let entries: string[];
    try {
      const dirents = await fs.readdir(this.rootDir, { withFileTypes: true });
      entries = dirents.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const records = await Promise.all(entries.map((id) => this.load(id)));
    return records.filter((r): r is SessionRecord => r !== null).sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async latest(): Promise<SessionRecord | null> {
    const [first] = await this.list();
    return first ?? null;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function isSessionRecord(value: unknown): value is SessionRecord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('sessionId' in value) || typeof value.sessionId !== 'string') return false;
  if (!('status' in value) || !SESSION_STATUSES.some((s) => s === value.status)) return false;
  if (!('updatedAt' in value) || typeof value.updatedAt !== 'string') return false;
  if (!('state' in value) || typeof value.state !== 'object' || value.state === null) return false;
  const state = value.state;
  return 'originalTask' in state && typeof state.originalTask === 'string' && 'history' in state && Array.isArray(state.history);
}
