export class AgentError extends Error {
  constructor(
    message: string,
    public code: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'AgentError';
  }
}

/** A node broke the routing protocol: unknown successor or an unauthorized outcome */
export class RoutingError extends AgentError {
  constructor(message: string) {
    super(message, 'ROUTING_ERROR');
    this.name = 'RoutingError';
  }
}

export class ConfigValidationError extends AgentError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

/** Failure talking to the reasoning engine or the tool bridge */
export class CollaboratorError extends AgentError {
  constructor(
    message: string,
    public status?: number,
    originalError?: unknown,
  ) {
    super(message, 'COLLABORATOR_ERROR', originalError);
    this.name = 'CollaboratorError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
