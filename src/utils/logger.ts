export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Logger interface shared by the control loop, nodes and collaborators */
export interface AgentLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/** Console logger with a session prefix and a minimum level */
export class ConsoleAgentLogger implements AgentLogger {
  private prefix: string;

  constructor(
    sessionId?: string,
    private level: LogLevel = 'info',
  ) {
    this.prefix = sessionId ? `[autopilot:${sessionId.slice(0, 8)}]` : '[autopilot]';
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('info')) console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('warn')) console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('error')) console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled('debug')) console.debug(this.format('DEBUG', message, data));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(level: string, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${level.padEnd(5)} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

export const silentLogger: AgentLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  if (normalized === 'warning') return 'warn';
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') return normalized;
  return 'info';
}
