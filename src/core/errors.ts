export class LatsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LatsError';
  }
}

export class ConfigError extends LatsError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ExecutorError extends LatsError {
  constructor(message: string, public readonly operation: string, cause?: Error) {
    super(message, 'EXECUTOR_ERROR', operation, cause);
    this.name = 'ExecutorError';
  }
}

/**
 * Fatal tier: thought or strategy generation failed and the run cannot continue.
 * The partial tree built by earlier iterations stays on the engine.
 */
export class ExpansionError extends LatsError {
  constructor(
    message: string,
    public readonly iteration: number,
    public readonly nodeId: string,
    cause?: Error,
  ) {
    super(message, 'EXPANSION_ERROR', 'expansion', cause);
    this.name = 'ExpansionError';
  }
}

export class PersistenceError extends LatsError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', 'persist', cause);
    this.name = 'PersistenceError';
  }
}

export class WinningPathParseError extends LatsError {
  constructor(message: string, public readonly line?: number, cause?: Error) {
    super(message, 'WINNING_PATH_PARSE_ERROR', 'persist', cause);
    this.name = 'WinningPathParseError';
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : String(value));
}
