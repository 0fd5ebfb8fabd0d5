import type { ConversionPhase } from './types.js';

export enum ErrorCode {
  // process
  START_FAILED = 'START_FAILED',
  EXITED = 'EXITED',
  START_TIMEOUT = 'START_TIMEOUT',
  KILL_FAILED = 'KILL_FAILED',
  ALREADY_RUNNING = 'ALREADY_RUNNING',
  // protocol
  COMMAND_FAILED = 'COMMAND_FAILED',
  SUBSCRIPTION_CONFLICT = 'SUBSCRIPTION_CONFLICT',
  ABORTED = 'ABORTED',
  PARSE_FAILED = 'PARSE_FAILED',
  PROTOCOL_TIMEOUT = 'PROTOCOL_TIMEOUT',
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',
  CONNECT_FAILED = 'CONNECT_FAILED',
  // configuration
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  DIRECTORY_NOT_FOUND = 'DIRECTORY_NOT_FOUND',
  INVALID_SIZE = 'INVALID_SIZE',
  EXECUTABLE_NOT_FOUND = 'EXECUTABLE_NOT_FOUND',
  // conversion
  CONVERSION_TIMEOUT = 'CONVERSION_TIMEOUT',
  NAVIGATION_FAILED = 'NAVIGATION_FAILED',
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  UNSUPPORTED_INPUT = 'UNSUPPORTED_INPUT',
  SCRIPT_FAILED = 'SCRIPT_FAILED',
  RENDER_FAILED = 'RENDER_FAILED',
}

/**
 * Base class for every error pagepress raises on purpose.
 *
 * `phase` is stamped by the converter when the error escapes a pipeline step,
 * so callers can tell a startup failure from a navigation or render failure.
 */
export class RenderError extends Error {
  code: ErrorCode;
  context?: Record<string, unknown>;
  phase?: ConversionPhase;

  constructor(
    code: ErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RenderError';
    this.code = code;
    this.context = context;
  }

  /** True when the failure lies with the browser process or the protocol link rather than the content. */
  get isInfrastructure(): boolean {
    return this instanceof ProcessError
      || this instanceof ProtocolError
      || this instanceof ProtocolTimeoutError
      || this instanceof ProtocolConnectionError;
  }
}

export class ProcessError extends RenderError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, context, options);
    this.name = 'ProcessError';
  }
}

export class ProtocolError extends RenderError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, context, options);
    this.name = 'ProtocolError';
  }
}

/** An inbound frame that is neither a reply nor an event. Logged and dropped by the receive loop. */
export class ProtocolParseError extends ProtocolError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(ErrorCode.PARSE_FAILED, message, context, options);
    this.name = 'ProtocolParseError';
  }
}

export class ProtocolTimeoutError extends RenderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.PROTOCOL_TIMEOUT, message, context);
    this.name = 'ProtocolTimeoutError';
  }
}

export class ProtocolConnectionError extends RenderError {
  constructor(code: ErrorCode.CONNECTION_CLOSED | ErrorCode.CONNECT_FAILED, message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, context, options);
    this.name = 'ProtocolConnectionError';
  }
}

export class ConfigurationError extends RenderError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, message, context);
    this.name = 'ConfigurationError';
  }
}

export class ConversionTimeoutError extends RenderError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(ErrorCode.CONVERSION_TIMEOUT, message, context, options);
    this.name = 'ConversionTimeoutError';
  }
}

export class NavigationError extends RenderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.NAVIGATION_FAILED, message, context);
    this.name = 'NavigationError';
  }
}

export class ConversionError extends RenderError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(code, message, context, options);
    this.name = 'ConversionError';
  }
}

/** Flattens an unknown thrown value into a message fit for a log line. */
export function describeError(error: unknown): string {
  if (error instanceof RenderError) return `${error.code}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
