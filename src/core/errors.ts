export type RebalanceErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'ORDER_REJECTED'
  | 'CONFIGURATION_ERROR'
  | 'RUN_IN_PROGRESS';

export class RebalanceError extends Error {
  readonly code: RebalanceErrorCode;

  constructor(code: RebalanceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Leaderboard, broker or store unreachable, failing, or timed out. */
export class SourceUnavailableError extends RebalanceError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `${source}: ${message}`, options);
    this.source = source;
  }
}

export class OrderRejectedError extends RebalanceError {
  readonly symbol: string;

  constructor(symbol: string, message: string, options?: { cause?: unknown }) {
    super('ORDER_REJECTED', message, options);
    this.symbol = symbol;
  }
}

export class ConfigurationError extends RebalanceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION_ERROR', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class RunInProgressError extends RebalanceError {
  constructor(activeRunId: string) {
    super('RUN_IN_PROGRESS', `Rebalance run ${activeRunId} is still in progress`);
  }
}

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const errorCode = (err: unknown): string => (err instanceof RebalanceError ? err.code : 'UNEXPECTED');
