export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Parses a positive integer CLI option such as --max-steps */
export function parsePositiveInt(value: string, flag: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`${flag} must be a positive integer, got "${value}"`);
  }
  const n = Number.parseInt(trimmed, 10);
  if (n < 1) {
    throw new ValidationError(`${flag} must be >= 1`);
  }
  return n;
}

export function validateTask(task: string): string {
  const trimmed = task.trim();
  if (!trimmed) throw new ValidationError('Task description must not be empty');
  return trimmed;
}

/** Session ids are used as directory names */
export function validateSessionId(id: string): string {
  if (!/^[\w-]+$/.test(id)) {
    throw new ValidationError(`Invalid session id: "${id}"`);
  }
  return id;
}
