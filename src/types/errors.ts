/**
 * Error types and classifications for archive operations
 */

/**
 * Archive error types
 */
export enum ArchiveErrorType {
  // Rate limit errors - wait for the server-declared delay, then retry
  RATE_LIMIT = 'RATE_LIMIT',

  // Transient errors - retry with exponential backoff
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',

  // Permanent errors - no retry, fail the channel
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

  UNKNOWN = 'UNKNOWN',
}

/**
 * Archive error classification
 */
export enum ArchiveErrorClassification {
  RATE_LIMIT = 'RATE_LIMIT',
  TRANSIENT = 'TRANSIENT',
  PERMANENT = 'PERMANENT',
}

export interface ArchiveError extends Error {
  type: ArchiveErrorType;
  classification: ArchiveErrorClassification;
  context?: Record<string, unknown>;
  statusCode?: number;
  retryable: boolean;
}

export class ArchiveOperationError extends Error implements ArchiveError {
  type: ArchiveErrorType;
  classification: ArchiveErrorClassification;
  context?: Record<string, unknown>;
  statusCode?: number;
  retryable: boolean;

  constructor(
    message: string,
    type: ArchiveErrorType,
    classification: ArchiveErrorClassification,
    context?: Record<string, unknown>,
    statusCode?: number
  ) {
    super(message);
    this.name = 'ArchiveOperationError';
    this.type = type;
    this.classification = classification;
    this.context = context;
    this.statusCode = statusCode;
    this.retryable = classification === ArchiveErrorClassification.TRANSIENT;

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, ArchiveOperationError.prototype);
  }
}

/**
 * System error codes raised by sockets and streams that are worth retrying
 */
const TRANSIENT_ERROR_CODES = new Set([
  'EPIPE',
  'ECONNRESET',
  'ECONNABORTED',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EIO',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

const TRANSIENT_MESSAGE_FRAGMENTS = ['broken pipe', 'connection', 'timeout'];

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null || !(key in error)) {
    return undefined;
  }
  return Reflect.get(error, key);
}

/**
 * Extract a human-readable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

/**
 * Helper function to classify errors
 */
export function classifyError(error: unknown): ArchiveError {
  if (error instanceof ArchiveOperationError) {
    return error;
  }

  const message = getErrorMessage(error);
  const lowerMessage = message.toLowerCase();
  const code = readProperty(error, 'code');
  const status = readProperty(error, 'status');

  if (status === 429 || code === 429 || lowerMessage.includes('rate limit')) {
    return new ArchiveOperationError(
      'Rate limit exceeded',
      ArchiveErrorType.RATE_LIMIT,
      ArchiveErrorClassification.RATE_LIMIT,
      { originalError: message },
      429
    );
  }

  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
    return new ArchiveOperationError(
      'Network error occurred',
      ArchiveErrorType.NETWORK_ERROR,
      ArchiveErrorClassification.TRANSIENT,
      { originalError: message, code }
    );
  }

  if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
    return new ArchiveOperationError(
      'Operation timed out',
      ArchiveErrorType.TIMEOUT,
      ArchiveErrorClassification.TRANSIENT,
      { originalError: message }
    );
  }

  if (
    TRANSIENT_MESSAGE_FRAGMENTS.some((fragment) =>
      lowerMessage.includes(fragment)
    )
  ) {
    return new ArchiveOperationError(
      'Network error occurred',
      ArchiveErrorType.NETWORK_ERROR,
      ArchiveErrorClassification.TRANSIENT,
      { originalError: message }
    );
  }

  if (status === 401 || lowerMessage.includes('unauthorized')) {
    return new ArchiveOperationError(
      'Authentication failed',
      ArchiveErrorType.AUTHENTICATION_FAILED,
      ArchiveErrorClassification.PERMANENT,
      { originalError: message },
      401
    );
  }

  if (status === 403 || lowerMessage.includes('forbidden')) {
    return new ArchiveOperationError(
      'Permission denied',
      ArchiveErrorType.PERMISSION_DENIED,
      ArchiveErrorClassification.PERMANENT,
      { originalError: message },
      403
    );
  }

  if (status === 404 || lowerMessage.includes('not found')) {
    return new ArchiveOperationError(
      'Resource not found',
      ArchiveErrorType.RESOURCE_NOT_FOUND,
      ArchiveErrorClassification.PERMANENT,
      { originalError: message },
      404
    );
  }

  // Unclassified errors are not retried
  return new ArchiveOperationError(
    message || 'Unknown error occurred',
    ArchiveErrorType.UNKNOWN,
    ArchiveErrorClassification.PERMANENT,
    { originalError: message }
  );
}

/**
 * Check if an error is a rate limit error
 */
export function isRateLimitError(error: unknown): boolean {
  return (
    classifyError(error).classification === ArchiveErrorClassification.RATE_LIMIT
  );
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return classifyError(error).retryable;
}
