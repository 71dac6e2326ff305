/**
 * Custom error types for the UID mailbox layer
 * Provides structured error handling with context and categorization
 */

export enum ErrorCode {
  // Session protocol errors
  PROTOCOL_ERROR = "PROTOCOL_ERROR",
  MALFORMED_RESPONSE = "MALFORMED_RESPONSE",

  // Connection errors
  CONNECTION_FAILED = "CONNECTION_FAILED",
  CONNECTION_TIMEOUT = "CONNECTION_TIMEOUT",
  CONNECTION_REFUSED = "CONNECTION_REFUSED",
  CONNECTION_LOST = "CONNECTION_LOST",

  // Mailbox errors
  NO_SUCH_MESSAGE = "NO_SUCH_MESSAGE",
  NO_SUCH_FOLDER = "NO_SUCH_FOLDER",
  EMPTY_MAILBOX = "EMPTY_MAILBOX",

  // Unsupported requests
  UNSUPPORTED_OPERATION = "UNSUPPORTED_OPERATION",
  UNSUPPORTED_TARGET = "UNSUPPORTED_TARGET",

  // Validation errors
  VALIDATION_FAILED = "VALIDATION_FAILED",

  // Configuration errors
  CONFIG_INVALID = "CONFIG_INVALID",

  // Internal errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export interface ErrorContext {
  operation?: string;
  service?: string;
  folder?: string;
  timestamp?: Date;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all mailbox errors
 */
export abstract class MailboxStoreError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isRetryable = false,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      ...context,
      timestamp: context.timestamp || new Date(),
    };
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a serializable representation of the error
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return this.message;
  }
}

/**
 * The session answered a request with a status other than OK
 */
export class ProtocolError extends MailboxStoreError {
  public readonly status: string;
  public readonly command: string;

  constructor(
    message: string,
    status: string,
    command: string,
    context: ErrorContext = {},
  ) {
    super(message, ErrorCode.PROTOCOL_ERROR, context, false);
    this.status = status;
    this.command = command;
  }

  getUserMessage(): string {
    return `The mail server rejected ${this.command} with status ${this.status}.`;
  }
}

/**
 * An OK response whose payload does not have the expected shape
 */
export class MalformedResponseError extends MailboxStoreError {
  public readonly response: unknown;

  constructor(message: string, response?: unknown, context: ErrorContext = {}) {
    super(message, ErrorCode.MALFORMED_RESPONSE, context, false);
    this.response = response;
  }

  getUserMessage(): string {
    return "The mail server sent a response that could not be understood.";
  }
}

/**
 * The addressed UID does not exist in the selected folder
 */
export class NoSuchMessageError extends MailboxStoreError {
  public readonly uid: number;
  public readonly folder?: string;

  constructor(
    message: string,
    uid: number,
    folder?: string,
    context: ErrorContext = {},
  ) {
    super(message, ErrorCode.NO_SUCH_MESSAGE, { ...context, folder }, false);
    this.uid = uid;
    this.folder = folder;
  }

  getUserMessage(): string {
    return this.folder
      ? `No message with UID ${this.uid} in folder ${this.folder}.`
      : `No message with UID ${this.uid}.`;
  }
}

export class NoSuchFolderError extends MailboxStoreError {
  public readonly folder: string;

  constructor(message: string, folder: string, context: ErrorContext = {}) {
    super(message, ErrorCode.NO_SUCH_FOLDER, { ...context, folder }, false);
    this.folder = folder;
  }

  getUserMessage(): string {
    return `The folder ${this.folder} does not exist.`;
  }
}

export class EmptyMailboxError extends MailboxStoreError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.EMPTY_MAILBOX, context, false);
  }

  getUserMessage(): string {
    return "The mailbox is empty.";
  }
}

/**
 * Operation has no IMAP equivalent (in-place replacement of a message)
 */
export class UnsupportedOperationError extends MailboxStoreError {
  public readonly operation: string;

  constructor(message: string, operation: string, context: ErrorContext = {}) {
    super(message, ErrorCode.UNSUPPORTED_OPERATION, context, false);
    this.operation = operation;
  }

  getUserMessage(): string {
    return `The operation '${this.operation}' is not supported for IMAP mailboxes.`;
  }
}

export class UnsupportedTargetError extends MailboxStoreError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.UNSUPPORTED_TARGET, context, false);
  }

  getUserMessage(): string {
    return "The copy or move target is not a folder name or a mailbox.";
  }
}

/**
 * Connection-related errors
 */
export class ConnectionError extends MailboxStoreError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONNECTION_FAILED,
    context: ErrorContext = {},
  ) {
    super(message, code, context, true); // Connection errors are usually retryable
  }

  getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.CONNECTION_TIMEOUT:
        return "Connection timed out. Please check your network connection and try again.";
      case ErrorCode.CONNECTION_REFUSED:
        return "Connection was refused. The server may be unavailable.";
      case ErrorCode.CONNECTION_LOST:
        return "Connection was lost. Reconnect the mailbox and try again.";
      default:
        return "Unable to connect to the server. Please try again later.";
    }
  }
}

/**
 * Input validation errors
 */
export class ValidationError extends MailboxStoreError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    field?: string,
    value?: unknown,
    context: ErrorContext = {},
  ) {
    super(message, ErrorCode.VALIDATION_FAILED, context, false);
    this.field = field;
    this.value = value;
  }

  getUserMessage(): string {
    if (this.field) {
      return `Invalid value for field '${this.field}': ${this.message}`;
    }
    return `Validation failed: ${this.message}`;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends MailboxStoreError {
  public readonly configKey?: string;

  constructor(message: string, configKey?: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIG_INVALID, context, false);
    this.configKey = configKey;
  }

  getUserMessage(): string {
    if (this.configKey) {
      return `Configuration error for '${this.configKey}': ${this.message}`;
    }
    return `Configuration error: ${this.message}`;
  }
}

class InternalError extends MailboxStoreError {
  constructor(error: Error, context: ErrorContext) {
    super(error.message, ErrorCode.INTERNAL_ERROR, context, false);
    this.stack = error.stack;
  }

  getUserMessage(): string {
    return "An unexpected error occurred. Please try again.";
  }
}

/**
 * Convert any error to MailboxStoreError
 */
export function toMailboxStoreError(
  error: Error,
  context: ErrorContext = {},
): MailboxStoreError {
  if (error instanceof MailboxStoreError) {
    return error;
  }

  if (
    error.message.includes("timeout") ||
    error.message.includes("ETIMEDOUT")
  ) {
    return new ConnectionError(
      error.message,
      ErrorCode.CONNECTION_TIMEOUT,
      context,
    );
  }

  if (error.message.includes("ECONNREFUSED")) {
    return new ConnectionError(
      error.message,
      ErrorCode.CONNECTION_REFUSED,
      context,
    );
  }

  if (
    error.message.includes("connection") ||
    error.message.includes("ECONNRESET") ||
    error.message.includes("ENOTFOUND") ||
    error.message.includes("EPIPE")
  ) {
    return new ConnectionError(
      error.message,
      ErrorCode.CONNECTION_FAILED,
      context,
    );
  }

  return new InternalError(error, context);
}
