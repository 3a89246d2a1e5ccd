export type SearchStage = 'config' | 'select' | 'expand' | 'evaluate' | 'backpropagate' | 'oracle';

export class SearchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: SearchStage,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SearchError';
  }
}

export class ConfigError extends SearchError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class InvalidConfigurationError extends SearchError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'INVALID_CONFIGURATION', 'config');
    this.name = 'InvalidConfigurationError';
  }
}

export class ProviderError extends SearchError {
  constructor(message: string, public readonly provider: string, cause?: Error) {
    super(message, 'PROVIDER_ERROR', 'oracle', cause);
    this.name = 'ProviderError';
  }
}

/**
 * The oracle could not be reached, or kept failing, after the retry policy ran out.
 */
export class OracleUnavailableError extends SearchError {
  constructor(message: string, public readonly attempts: number, cause?: Error) {
    super(message, 'ORACLE_UNAVAILABLE', 'oracle', cause);
    this.name = 'OracleUnavailableError';
  }
}

/**
 * The oracle answered, but the answer cannot be turned into trajectory content.
 * Never retried against the same request.
 */
export class MalformedCompletionError extends SearchError {
  constructor(message: string, cause?: Error) {
    super(message, 'MALFORMED_COMPLETION', 'expand', cause);
    this.name = 'MalformedCompletionError';
  }
}

export class UnknownParentError extends SearchError {
  constructor(public readonly parentId: string) {
    super(`Parent node "${parentId}" does not exist`, 'UNKNOWN_PARENT', 'expand');
    this.name = 'UnknownParentError';
  }
}

/**
 * A completion arrived for a node that was retired while the request was in
 * flight. The completion is dropped and does not count as a failure.
 */
export class NodeRetiredError extends SearchError {
  constructor(public readonly nodeId: string) {
    super(`Node "${nodeId}" was retired before its expansion finished`, 'NODE_RETIRED', 'expand');
    this.name = 'NodeRetiredError';
  }
}

export class DuplicateRootError extends SearchError {
  constructor(public readonly rootId: string) {
    super(`Tree already has a root node "${rootId}"`, 'DUPLICATE_ROOT', 'expand');
    this.name = 'DuplicateRootError';
  }
}

export class NodeNotFoundError extends SearchError {
  constructor(public readonly nodeId: string) {
    super(`Node "${nodeId}" not found`, 'NODE_NOT_FOUND');
    this.name = 'NodeNotFoundError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
