/**
 * Error types for the Prometheus sample output.
 *
 * Configuration and transport errors surface synchronously to the caller
 * of `start()`; classification errors are per sample and only ever logged.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'classification'
  | 'registration'
  | 'serialization'
  | 'transport';

/**
 * Base error class for all metrics errors
 */
export abstract class MetricsError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options?: { statusCode?: number | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration error - malformed option string or invalid option value
 */
export class ConfigurationError extends MetricsError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;
  readonly option?: string;

  constructor(message: string, options?: { option?: string | undefined; cause?: Error | undefined }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    if (options?.option !== undefined) {
      this.option = options.option;
    }
  }
}

/**
 * Classification error - a sample that cannot be mapped onto a catalog entry
 */
export class ClassificationError extends MetricsError {
  readonly category = 'classification' as const;
  readonly isRetryable = false;
  readonly identity?: string;
  readonly field?: string;

  constructor(
    message: string,
    options?: { identity?: string | undefined; field?: string | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    if (options?.identity !== undefined) {
      this.identity = options.identity;
    }
    if (options?.field !== undefined) {
      this.field = options.field;
    }
  }
}

/**
 * Registration error - metric already registered with a different shape
 */
export class RegistrationError extends MetricsError {
  readonly category = 'registration' as const;
  readonly isRetryable = false;
  readonly metricName?: string;

  constructor(
    message: string,
    options?: { metricName?: string | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    if (options?.metricName !== undefined) {
      this.metricName = options.metricName;
    }
  }
}

/**
 * Serialization error - failed to serialize metrics to text format
 */
export class SerializationError extends MetricsError {
  readonly category = 'serialization' as const;
  readonly isRetryable = false;

  constructor(message: string, options?: { cause?: Error | undefined }) {
    super(message, { statusCode: 500, ...(options?.cause ? { cause: options.cause } : {}) });
  }
}

/**
 * Transport error - listener bind failure or accept-loop failure
 */
export class TransportError extends MetricsError {
  readonly category = 'transport' as const;
  readonly isRetryable = true;
  readonly address?: string;

  constructor(
    message: string,
    options?: { address?: string | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    if (options?.address !== undefined) {
      this.address = options.address;
    }
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof MetricsError) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Check if an error is a metrics error
 */
export function isMetricsError(error: unknown): error is MetricsError {
  return error instanceof MetricsError;
}

/**
 * Get the error category from an error
 */
export function getErrorCategory(error: unknown): ErrorCategory | undefined {
  if (error instanceof MetricsError) {
    return error.category;
  }
  return undefined;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof MetricsError) {
    const parts = [
      `[${error.category.toUpperCase()}]`,
      error.name,
      ':',
      error.message,
    ];

    if (error.statusCode) {
      parts.push(`(HTTP ${error.statusCode})`);
    }

    return parts.join(' ');
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}
