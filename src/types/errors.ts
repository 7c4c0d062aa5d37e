/**
 * Error types for pop3-client
 */

import type { SessionState } from './protocol.js';

/**
 * Error source categories
 */
export type ErrorSource = 'connection' | 'protocol' | 'server' | 'format' | 'state';

/**
 * Base POP3 error class
 */
export class Pop3Error extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;
  /** Command verb that caused the error (if applicable) */
  command?: string;
  /** Server response line (if applicable) */
  response?: string;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'Pop3Error';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Transport failure (refused connection, TLS failure, stream closed)
 */
export class Pop3ConnectionError extends Pop3Error {
  override source: 'connection' = 'connection';
  /** Server host */
  host: string;
  /** Server port */
  port: number;

  constructor(message: string, host: string, port: number, cause?: Error) {
    super(message, 'CONNECTION_ERROR', 'connection');
    this.name = 'Pop3ConnectionError';
    this.host = host;
    this.port = port;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Timeout while connecting or waiting for a reply line
 */
export class Pop3TimeoutError extends Pop3ConnectionError {
  /** Operation that timed out */
  operation: string;
  /** Timeout duration in milliseconds */
  timeoutMs: number;

  constructor(message: string, host: string, port: number, operation: string, timeoutMs: number) {
    super(message, host, port);
    this.name = 'Pop3TimeoutError';
    this.code = 'TIMEOUT_ERROR';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Framing violation (missing terminator, unrecognised status line)
 */
export class Pop3ProtocolError extends Pop3Error {
  override source: 'protocol' = 'protocol';
  /** Raw data that broke the framing rules */
  rawData: string;

  constructor(message: string, rawData: string, command?: string) {
    super(message, 'PROTOCOL_ERROR', 'protocol');
    this.name = 'Pop3ProtocolError';
    this.rawData = rawData;
    this.command = command;
  }
}

/**
 * Negative acknowledgement (-ERR) from the server
 */
export class Pop3ServerError extends Pop3Error {
  override source: 'server' = 'server';
  /** Full server response line */
  serverResponse: string;

  constructor(message: string, serverResponse: string, command?: string) {
    super(message, 'SERVER_ERROR', 'server');
    this.name = 'Pop3ServerError';
    this.serverResponse = serverResponse;
    this.command = command;
    this.response = serverResponse;
  }
}

/**
 * Status text that does not have the expected structure
 */
export class Pop3FormatError extends Pop3Error {
  override source: 'format' = 'format';
  /** Text that failed to parse */
  rawData: string;

  constructor(message: string, rawData: string, command?: string) {
    super(message, 'FORMAT_ERROR', 'format');
    this.name = 'Pop3FormatError';
    this.rawData = rawData;
    this.command = command;
  }
}

/**
 * Operation not permitted in the current session state
 */
export class Pop3StateError extends Pop3Error {
  override source: 'state' = 'state';
  /** Session state at the time of the call */
  state: SessionState;

  constructor(message: string, state: SessionState, command?: string) {
    super(message, 'STATE_ERROR', 'state');
    this.name = 'Pop3StateError';
    this.state = state;
    this.command = command;
  }
}

/**
 * Any error raised by this library
 */
export type AnyPop3Error =
  | Pop3ConnectionError
  | Pop3ProtocolError
  | Pop3ServerError
  | Pop3FormatError
  | Pop3StateError;

export function isPop3Error(value: unknown): value is AnyPop3Error {
  return value instanceof Pop3Error;
}

/**
 * Whether an error leaves the connection unusable
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof Pop3ConnectionError || error instanceof Pop3ProtocolError;
}
