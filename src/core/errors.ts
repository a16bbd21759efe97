/**
 * Error types
 *
 * All custom errors extend FilmAgentError and carry a machine code plus the
 * context needed to diagnose them.
 */

/** Base error */
export class FilmAgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'FilmAgentError';
  }
}

/** Invalid or unreadable configuration */
export class ConfigError extends FilmAgentError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', context, options);
    this.name = 'ConfigError';
  }
}

/** Memory or catalog persistence could not be reached */
export class StoreUnavailableError extends FilmAgentError {
  constructor(
    public readonly store: string,
    public readonly operation: string,
    options?: ErrorOptions,
  ) {
    super(
      `[${store}] ${operation} failed: store unavailable`,
      'STORE_UNAVAILABLE',
      { store, operation },
      options,
    );
    this.name = 'StoreUnavailableError';
  }
}

/** A tool call whose arguments do not match the tool's schema */
export class InvalidToolArgsError extends FilmAgentError {
  constructor(
    public readonly toolName: string,
    public readonly issues: string[],
    code: string = 'INVALID_TOOL_ARGS',
  ) {
    super(
      `Invalid arguments for ${toolName}: ${issues.join('; ')}`,
      code,
      { toolName, issues },
    );
    this.name = 'InvalidToolArgsError';
  }
}

/** A tool name outside the registry */
export class ToolNotFoundError extends InvalidToolArgsError {
  constructor(toolName: string) {
    super(toolName, [`unknown tool: ${toolName}`], 'TOOL_NOT_FOUND');
    this.name = 'ToolNotFoundError';
  }
}

/** A tool failed while running against the catalog */
export class ToolExecutionError extends FilmAgentError {
  constructor(
    public readonly toolName: string,
    public readonly params: Record<string, unknown>,
    cause?: Error,
  ) {
    super(
      `Tool failed: ${toolName}${cause ? ` (${cause.message})` : ''}`,
      'TOOL_EXECUTION_ERROR',
      { toolName, params },
      { cause },
    );
    this.name = 'ToolExecutionError';
  }
}

/** The router found no tool for an utterance */
export class NoToolMatchError extends FilmAgentError {
  constructor(utterance: string) {
    super('No tool matches the utterance', 'NO_TOOL_MATCH', {
      utterance: utterance.slice(0, 200),
    });
    this.name = 'NoToolMatchError';
  }
}

/** The completion oracle failed */
export class OracleUnavailableError extends FilmAgentError {
  constructor(
    providerName: string,
    message: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(
      `[${providerName}] ${message}`,
      'ORACLE_UNAVAILABLE',
      { providerName, ...context },
      options,
    );
    this.name = 'OracleUnavailableError';
  }
}

/** The completion oracle did not answer in time */
export class OracleTimeoutError extends FilmAgentError {
  constructor(providerName: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      `[${providerName}] completion timed out after ${timeoutMs}ms`,
      'ORACLE_TIMEOUT',
      { providerName, timeoutMs },
      options,
    );
    this.name = 'OracleTimeoutError';
  }
}

/** Preference extraction failed (logged, never surfaced) */
export class ExtractionFailureError extends FilmAgentError {
  constructor(userId: string, options?: ErrorOptions) {
    super('Preference extraction failed', 'EXTRACTION_FAILURE', { userId }, options);
    this.name = 'ExtractionFailureError';
  }
}

/** The only failures allowed to reach the user */
export function isOracleFailure(
  err: unknown,
): err is OracleUnavailableError | OracleTimeoutError {
  return err instanceof OracleUnavailableError || err instanceof OracleTimeoutError;
}

/** Normalize an unknown thrown value */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
