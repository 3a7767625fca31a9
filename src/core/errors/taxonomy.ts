/**
 * Error taxonomy
 * Structured error codes with default messages and operator suggestions
 */

export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  CONFIGURATION = 'CONFIGURATION',
  AUTHENTICATION = 'AUTHENTICATION',
  NETWORK = 'NETWORK',
  PROVIDER = 'PROVIDER',
  DEPLOYMENT = 'DEPLOYMENT',
  SYSTEM = 'SYSTEM'
}

export interface ErrorCode {
  readonly code: string;
  readonly category: ErrorCategory;
  /** Used when the error is created without a specific message */
  readonly message: string;
  readonly suggestions?: string[];
  readonly docsUrl?: string;
}

export interface DockerVmErrorOptions {
  /** Overrides the code's message with a specific one */
  message?: string;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class ErrorCodeRegistry {
  private static codes: Map<string, ErrorCode> = new Map();

  static register(errorCode: ErrorCode): ErrorCode {
    this.codes.set(errorCode.code, errorCode);
    return errorCode;
  }

  static get(code: string): ErrorCode | undefined {
    return this.codes.get(code);
  }
}

/**
 * Base structured error
 */
export abstract class DockerVmError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly timestamp: string;
  readonly context: Record<string, unknown>;

  constructor(errorCode: ErrorCode, options: DockerVmErrorOptions = {}) {
    super(options.message ?? errorCode.message, options.cause === undefined ? undefined : { cause: options.cause });

    this.name = this.constructor.name;
    this.code = errorCode.code;
    this.category = errorCode.category;
    this.timestamp = new Date().toISOString();
    this.context = options.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Suggestions registered for this error code, if any
   */
  get suggestions(): string[] {
    return ErrorCodeRegistry.get(this.code)?.suggestions ?? [];
  }

  get docsUrl(): string | undefined {
    return ErrorCodeRegistry.get(this.code)?.docsUrl;
  }

  /**
   * Structured record for debug logs, stack left out
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause
    };
  }
}

export class ValidationError extends DockerVmError {}

export class ConfigurationError extends DockerVmError {}

export class AuthenticationError extends DockerVmError {}

export class NetworkError extends DockerVmError {}

export class ProviderError extends DockerVmError {}

export class DeploymentError extends DockerVmError {}

class SystemError extends DockerVmError {}

/**
 * Build the error subclass matching the code's category
 */
export function createError(errorCode: ErrorCode, options: DockerVmErrorOptions = {}): DockerVmError {
  switch (errorCode.category) {
    case ErrorCategory.VALIDATION:
      return new ValidationError(errorCode, options);
    case ErrorCategory.CONFIGURATION:
      return new ConfigurationError(errorCode, options);
    case ErrorCategory.AUTHENTICATION:
      return new AuthenticationError(errorCode, options);
    case ErrorCategory.NETWORK:
      return new NetworkError(errorCode, options);
    case ErrorCategory.PROVIDER:
      return new ProviderError(errorCode, options);
    case ErrorCategory.DEPLOYMENT:
      return new DeploymentError(errorCode, options);
    default:
      return new SystemError(errorCode, options);
  }
}

export function isDockerVmError(error: unknown): error is DockerVmError {
  return error instanceof DockerVmError;
}
