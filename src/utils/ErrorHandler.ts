/**
 * Error taxonomy and classification for the refresh pipeline
 * Every failure on the fetch path is converted to a PortfolioError before it reaches a scheduler
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  NETWORK = 'network',
  AUTHENTICATION = 'authentication',
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration',
  EXTERNAL_SERVICE = 'external_service',
  CANCELLATION = 'cancellation'
}

export type PortfolioErrorKind =
  | 'InvalidCredentials'
  | 'AuthExpired'
  | 'NetworkError'
  | 'PortfolioNotFound'
  | 'DecodeError'
  | 'DuplicatePortfolio'
  | 'UnknownPortfolio'
  | 'Cancelled';

export interface ErrorContext {
  operation: string;
  component: string;
  portfolioId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Application error with classification and user-facing context
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;
  public readonly technicalMessage: string;
  public readonly suggestedActions: string[];

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
      suggestedActions?: string[];
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.determineRetryability();
    this.technicalMessage = message;
    this.userMessage = options.userMessage ?? this.generateUserMessage();
    this.suggestedActions = options.suggestedActions ?? this.generateSuggestedActions();
  }

  private determineRetryability(): boolean {
    return this.category === ErrorCategory.NETWORK || this.category === ErrorCategory.EXTERNAL_SERVICE;
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.NETWORK:
        return 'The portfolio provider could not be reached. Values shown may be stale.';
      case ErrorCategory.AUTHENTICATION:
        return 'Authentication with the portfolio provider failed. Please re-enter your credentials.';
      case ErrorCategory.VALIDATION:
        return 'Invalid input provided. Please check your data and try again.';
      case ErrorCategory.CONFIGURATION:
        return 'The configured portfolio is no longer available at the provider. Please reconfigure it.';
      case ErrorCategory.EXTERNAL_SERVICE:
        return 'The portfolio provider returned an unexpected response. Values shown may be stale.';
      case ErrorCategory.CANCELLATION:
        return 'The refresh was cancelled because the portfolio was stopped or reconfigured.';
      default:
        return 'An unexpected error occurred.';
    }
  }

  private generateSuggestedActions(): string[] {
    switch (this.category) {
      case ErrorCategory.NETWORK:
        return ['Check your internet connection', 'Use the refresh button to retry'];
      case ErrorCategory.AUTHENTICATION:
        return ['Verify your email and password', 'Update the credentials and resume the portfolio'];
      case ErrorCategory.CONFIGURATION:
        return ['Check that the portfolio still exists at the provider', 'Select the portfolio again'];
      case ErrorCategory.EXTERNAL_SERVICE:
        return ['Wait for the next scheduled update'];
      case ErrorCategory.CANCELLATION:
        return ['Refresh again once the portfolio is running'];
      default:
        return [];
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage,
      technicalMessage: this.technicalMessage,
      suggestedActions: this.suggestedActions
    };
  }
}

const KIND_CLASSIFICATION: Record<PortfolioErrorKind, { category: ErrorCategory; severity: ErrorSeverity; code: string }> = {
  InvalidCredentials: { category: ErrorCategory.AUTHENTICATION, severity: ErrorSeverity.CRITICAL, code: 'INVALID_CREDENTIALS' },
  AuthExpired: { category: ErrorCategory.AUTHENTICATION, severity: ErrorSeverity.LOW, code: 'AUTH_EXPIRED' },
  NetworkError: { category: ErrorCategory.NETWORK, severity: ErrorSeverity.MEDIUM, code: 'NETWORK_ERROR' },
  PortfolioNotFound: { category: ErrorCategory.CONFIGURATION, severity: ErrorSeverity.HIGH, code: 'PORTFOLIO_NOT_FOUND' },
  DecodeError: { category: ErrorCategory.EXTERNAL_SERVICE, severity: ErrorSeverity.MEDIUM, code: 'DECODE_ERROR' },
  DuplicatePortfolio: { category: ErrorCategory.VALIDATION, severity: ErrorSeverity.LOW, code: 'DUPLICATE_PORTFOLIO' },
  UnknownPortfolio: { category: ErrorCategory.VALIDATION, severity: ErrorSeverity.LOW, code: 'UNKNOWN_PORTFOLIO' },
  Cancelled: { category: ErrorCategory.CANCELLATION, severity: ErrorSeverity.LOW, code: 'REFRESH_CANCELLED' }
};

/**
 * Error raised anywhere on the portfolio refresh path.
 * `kind` is what schedulers and the coordinator switch on.
 */
export class PortfolioError extends ApplicationError {
  public readonly kind: PortfolioErrorKind;

  constructor(
    kind: PortfolioErrorKind,
    message: string,
    context: ErrorContext,
    originalError?: Error
  ) {
    const classification = KIND_CLASSIFICATION[kind];
    super(message, classification.code, classification.category, classification.severity, context, {
      originalError,
      // AuthExpired is recovered by the session layer, never by a scheduler retry
      isRetryable: kind === 'NetworkError' || kind === 'DecodeError'
    });
    this.name = 'PortfolioError';
    this.kind = kind;
  }

  /** Terminal kinds stop automatic refreshes until the user acts */
  get requiresUserAction(): boolean {
    return this.kind === 'InvalidCredentials' || this.kind === 'PortfolioNotFound';
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind };
  }
}

export function isPortfolioError(error: unknown, kind?: PortfolioErrorKind): error is PortfolioError {
  return error instanceof PortfolioError && (kind === undefined || error.kind === kind);
}

export interface ErrorMetric {
  count: number;
  lastOccurrence: Date;
}

/**
 * Converts raw failures into PortfolioErrors and keeps per-code counters
 */
export class ErrorHandler {
  private errorMetrics: Map<string, ErrorMetric> = new Map();

  /**
   * Wraps anything thrown on the fetch path into a PortfolioError and records it
   */
  toPortfolioError(error: unknown, context: Omit<ErrorContext, 'timestamp'>): PortfolioError {
    const wrapped = this.wrapError(error, { ...context, timestamp: new Date() });
    this.recordErrorMetrics(wrapped);
    return wrapped;
  }

  private wrapError(error: unknown, context: ErrorContext): PortfolioError {
    if (error instanceof PortfolioError) {
      return error;
    }

    if (error instanceof SyntaxError) {
      return new PortfolioError('DecodeError', `Malformed response: ${error.message}`, context, error);
    }

    if (error instanceof Error) {
      // fetch rejects with TypeError on connection failures, AbortSignal.timeout with TimeoutError
      const name = error.name;
      const message = error.message.toLowerCase();
      if (name === 'TimeoutError' || name === 'AbortError' || message.includes('timeout')) {
        return new PortfolioError('NetworkError', `Request timed out: ${error.message}`, context, error);
      }
      return new PortfolioError('NetworkError', error.message, context, error);
    }

    return new PortfolioError('NetworkError', String(error), context);
  }

  private recordErrorMetrics(error: PortfolioError): void {
    const key = `${error.category}:${error.code}`;
    const existing = this.errorMetrics.get(key);

    this.errorMetrics.set(key, {
      count: (existing?.count ?? 0) + 1,
      lastOccurrence: new Date()
    });
  }

  /**
   * Gets error counters keyed by `category:code`
   */
  getErrorMetrics(): Map<string, ErrorMetric> {
    return new Map(this.errorMetrics);
  }

  resetErrorMetrics(): void {
    this.errorMetrics.clear();
  }
}
