/**
 * Error model for the proportional asset ledger
 * Every rejected operation surfaces as a typed LedgerError carrying its context
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  VALIDATION = 'validation',
  AUTHORIZATION = 'authorization',
  BUSINESS_LOGIC = 'business_logic',
  EXTERNAL_SERVICE = 'external_service',
  SYSTEM = 'system'
}

export interface ErrorContext {
  operation: string;
  component: string;
  accountId?: string;
  assetId?: string;
  offerId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Application error with category, severity and operation context
 */
export class ApplicationError<C extends string = string> extends Error {
  public readonly code: C;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;
  public readonly technicalMessage: string;

  constructor(
    message: string,
    code: C,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: {
      originalError?: Error;
      isRetryable?: boolean;
      userMessage?: string;
    } = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.category === ErrorCategory.EXTERNAL_SERVICE;
    this.technicalMessage = message;
    this.userMessage = options.userMessage ?? this.generateUserMessage();
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.VALIDATION:
        return 'Invalid input provided. Please check the request and try again.';
      case ErrorCategory.AUTHORIZATION:
        return 'The account is not allowed to perform this operation.';
      case ErrorCategory.BUSINESS_LOGIC:
        return 'Operation could not be completed due to ledger rules. Please review holdings and offers.';
      case ErrorCategory.EXTERNAL_SERVICE:
        return 'Payment could not be completed. No units were moved; the operation may be resubmitted.';
      case ErrorCategory.SYSTEM:
        return 'Internal ledger error. The operation was not applied.';
      default:
        return 'An unexpected error occurred.';
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
      technicalMessage: this.technicalMessage
    };
  }
}

export type LedgerErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_DENOMINATION'
  | 'INVALID_AMOUNT'
  | 'INVALID_ACCOUNT'
  | 'INSUFFICIENT_UNITS'
  | 'INSUFFICIENT_UNLOCKED_UNITS'
  | 'INVALID_UNLOCK'
  | 'EXCEEDS_REMAINING'
  | 'NOT_OPEN'
  | 'NOT_SELLER'
  | 'ASSET_CLAIMED'
  | 'ALREADY_CLAIMED'
  | 'INSUFFICIENT_OWNERSHIP'
  | 'PAYMENT_FAILED'
  | 'ASSET_ALREADY_EXISTS'
  | 'SELF_PURCHASE'
  | 'UNTRUSTED_ACCOUNT'
  | 'CONSERVATION_VIOLATION'
  | 'TRANSACTION_IN_PROGRESS';

const LEDGER_ERROR_CLASSIFICATION: Record<LedgerErrorCode, [ErrorCategory, ErrorSeverity]> = {
  NOT_FOUND: [ErrorCategory.VALIDATION, ErrorSeverity.LOW],
  INVALID_DENOMINATION: [ErrorCategory.VALIDATION, ErrorSeverity.LOW],
  INVALID_AMOUNT: [ErrorCategory.VALIDATION, ErrorSeverity.LOW],
  INVALID_ACCOUNT: [ErrorCategory.VALIDATION, ErrorSeverity.LOW],
  INSUFFICIENT_UNITS: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM],
  INSUFFICIENT_UNLOCKED_UNITS: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM],
  INVALID_UNLOCK: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.HIGH],
  EXCEEDS_REMAINING: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM],
  NOT_OPEN: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM],
  NOT_SELLER: [ErrorCategory.AUTHORIZATION, ErrorSeverity.MEDIUM],
  ASSET_CLAIMED: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM],
  ALREADY_CLAIMED: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM],
  INSUFFICIENT_OWNERSHIP: [ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM],
  PAYMENT_FAILED: [ErrorCategory.EXTERNAL_SERVICE, ErrorSeverity.HIGH],
  ASSET_ALREADY_EXISTS: [ErrorCategory.VALIDATION, ErrorSeverity.LOW],
  SELF_PURCHASE: [ErrorCategory.AUTHORIZATION, ErrorSeverity.LOW],
  UNTRUSTED_ACCOUNT: [ErrorCategory.AUTHORIZATION, ErrorSeverity.MEDIUM],
  CONSERVATION_VIOLATION: [ErrorCategory.SYSTEM, ErrorSeverity.CRITICAL],
  TRANSACTION_IN_PROGRESS: [ErrorCategory.SYSTEM, ErrorSeverity.HIGH]
};

/**
 * Typed failure of a ledger operation
 */
export class LedgerError extends ApplicationError<LedgerErrorCode> {
  constructor(
    code: LedgerErrorCode,
    message: string,
    context: ErrorContext,
    options: { originalError?: Error; userMessage?: string } = {}
  ) {
    const [category, severity] = LEDGER_ERROR_CLASSIFICATION[code];
    super(message, code, category, severity, context, options);
    this.name = 'LedgerError';
  }
}

/**
 * Builds a LedgerError stamped with the current time
 */
export function ledgerError(
  code: LedgerErrorCode,
  message: string,
  context: Omit<ErrorContext, 'timestamp'>,
  options?: { originalError?: Error; userMessage?: string }
): LedgerError {
  return new LedgerError(code, message, { ...context, timestamp: new Date() }, options);
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
