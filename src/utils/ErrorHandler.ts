/**
 * Exchange error taxonomy and classification
 * Decides whether a failure is retried, absorbed until the next cycle, or escalated
 */

export enum ErrorCategory {
  TRANSIENT_NETWORK = 'transient_network',
  FATAL = 'fatal',
  INSUFFICIENT_MARKET_DATA = 'insufficient_market_data',
  AMBIGUOUS_WRITE_OUTCOME = 'ambiguous_write_outcome'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export type OperationPhase = 'read' | 'write';

export interface ErrorContext {
  operation: string;
  component: string;
  marketId?: string;
  venueId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Allow-lists that turn otherwise fatal transport failures into transient ones.
 */
export interface NonFatalErrorPolicy {
  nonFatalErrorCodes: readonly number[];
  nonFatalErrorMessages: readonly string[];
}

/**
 * What a connector observed when a request failed at the transport level.
 */
export interface TransportFailureDetails {
  statusCode?: number;
  message: string;
  timedOut?: boolean;
}

/**
 * Raised by connectors for HTTP and socket level failures, before classification.
 */
export class TransportFailure extends Error implements TransportFailureDetails {
  public readonly statusCode?: number;
  public readonly timedOut: boolean;

  constructor(message: string, options: { statusCode?: number; timedOut?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportFailure';
    this.statusCode = options.statusCode;
    this.timedOut = options.timedOut ?? false;
  }
}

const SEVERITY_BY_CATEGORY: Record<ErrorCategory, ErrorSeverity> = {
  [ErrorCategory.TRANSIENT_NETWORK]: ErrorSeverity.LOW,
  [ErrorCategory.INSUFFICIENT_MARKET_DATA]: ErrorSeverity.LOW,
  [ErrorCategory.FATAL]: ErrorSeverity.HIGH,
  [ErrorCategory.AMBIGUOUS_WRITE_OUTCOME]: ErrorSeverity.CRITICAL
};

/**
 * Error surfaced by every exchange connector operation
 */
export class ExchangeError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly phase: OperationPhase;
  public readonly statusCode?: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    context: ErrorContext,
    options: {
      phase?: OperationPhase;
      statusCode?: number;
      originalError?: Error;
    } = {}
  ) {
    super(message);
    this.name = 'ExchangeError';
    this.code = code;
    this.category = category;
    this.severity = SEVERITY_BY_CATEGORY[category];
    this.context = context;
    this.phase = options.phase ?? 'read';
    this.statusCode = options.statusCode;
    this.originalError = options.originalError;
  }

  get isRetryable(): boolean {
    return this.category === ErrorCategory.TRANSIENT_NETWORK;
  }

  /**
   * Same error, re-tagged with the phase of the operation that raised it.
   */
  withPhase(phase: OperationPhase): ExchangeError {
    if (phase === this.phase) {
      return this;
    }
    return new ExchangeError(this.message, this.code, this.category, this.context, {
      phase,
      statusCode: this.statusCode,
      originalError: this.originalError
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      phase: this.phase,
      statusCode: this.statusCode,
      context: this.context
    };
  }
}

/**
 * Pure classification of a transport failure against the configured allow-lists.
 * Substring matching is case-sensitive.
 */
export function classifyFailure(
  failure: TransportFailureDetails,
  policy: NonFatalErrorPolicy
): ErrorCategory.TRANSIENT_NETWORK | ErrorCategory.FATAL {
  if (failure.timedOut) {
    return ErrorCategory.TRANSIENT_NETWORK;
  }
  if (failure.statusCode !== undefined && policy.nonFatalErrorCodes.includes(failure.statusCode)) {
    return ErrorCategory.TRANSIENT_NETWORK;
  }
  if (policy.nonFatalErrorMessages.some(fragment => fragment !== '' && failure.message.includes(fragment))) {
    return ErrorCategory.TRANSIENT_NETWORK;
  }
  return ErrorCategory.FATAL;
}

/**
 * Wraps anything thrown by a connector operation into an ExchangeError.
 * Existing ExchangeErrors pass through untouched.
 */
export function toExchangeError(
  error: unknown,
  context: ErrorContext,
  policy: NonFatalErrorPolicy,
  phase: OperationPhase = 'read'
): ExchangeError {
  if (error instanceof ExchangeError) {
    return error;
  }

  if (error instanceof TransportFailure) {
    const category = classifyFailure(error, policy);
    const code = error.timedOut
      ? 'REQUEST_TIMEOUT'
      : error.statusCode !== undefined
        ? `HTTP_${error.statusCode}`
        : 'NETWORK_ERROR';
    return new ExchangeError(`${context.operation} failed: ${error.message}`, code, category, context, {
      phase,
      statusCode: error.statusCode,
      originalError: error
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ExchangeError(`${context.operation} failed: ${message}`, 'UNEXPECTED_ERROR', ErrorCategory.FATAL, context, {
    phase,
    originalError: error instanceof Error ? error : undefined
  });
}

/**
 * Raised when a write failed and it is unknown whether the exchange applied it.
 */
export function ambiguousWriteError(cause: ExchangeError, reason: string): ExchangeError {
  return new ExchangeError(
    `${cause.context.operation} outcome unknown: ${reason} (${cause.message})`,
    'AMBIGUOUS_WRITE_OUTCOME',
    ErrorCategory.AMBIGUOUS_WRITE_OUTCOME,
    cause.context,
    { phase: 'write', statusCode: cause.statusCode, originalError: cause }
  );
}

export function insufficientMarketDataError(context: ErrorContext, reason: string): ExchangeError {
  return new ExchangeError(reason, 'INSUFFICIENT_MARKET_DATA', ErrorCategory.INSUFFICIENT_MARKET_DATA, context);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
