/**
 * POP3 Response Parser
 *
 * Parses POP3 server replies into structured objects.
 * Handles the +OK/-ERR status line and dot-terminated, dot-stuffed bodies.
 *
 * @packageDocumentation
 */

import type { Pop3Response } from '../types/protocol.js';
import type { LineChannel, LineSource } from '../transport/channel.js';
import { Pop3ConnectionError, Pop3ProtocolError, Pop3ServerError } from '../types/errors.js';

/**
 * Marker opening a positive reply
 */
export const OK_MARKER = '+OK';

/**
 * Marker opening a negative reply
 */
export const ERR_MARKER = '-ERR';

/**
 * Line closing a multi-line reply
 */
export const TERMINATOR = '.';

function createResponse(status: string, body: string[]): Pop3Response {
  return Object.freeze({ status, body: Object.freeze(body) });
}

/**
 * Checks if a line is a positive status line
 */
export function isOkResponse(line: string): boolean {
  return line.startsWith(OK_MARKER);
}

/**
 * Checks if a line is a negative status line
 */
export function isErrResponse(line: string): boolean {
  return line.startsWith(ERR_MARKER);
}

/**
 * Checks if a body line is the terminator. Only a lone "." qualifies.
 */
export function isTerminator(line: string): boolean {
  return line === TERMINATOR;
}

/**
 * Undoes byte-stuffing on a body line: a leading ".." becomes "."
 */
export function unstuffLine(line: string): string {
  return line.startsWith(TERMINATOR + TERMINATOR) ? line.slice(1) : line;
}

/**
 * Applies byte-stuffing to a body line, as a server does before sending it
 */
export function stuffLine(line: string): string {
  return line.startsWith(TERMINATOR) ? TERMINATOR + line : line;
}

/**
 * Parses a single status line
 *
 * @param line - The reply line without CRLF (e.g., "+OK 2 messages")
 * @param command - Verb the line answers, recorded on errors
 * @returns Response with the trimmed status text and an empty body
 * @throws Pop3ServerError on "-ERR"
 * @throws Pop3ProtocolError when the line carries neither marker
 */
export function parseShort(line: string, command?: string): Pop3Response {
  if (isOkResponse(line)) {
    return createResponse(line.slice(OK_MARKER.length).trim(), []);
  }

  if (isErrResponse(line)) {
    throw new Pop3ServerError(line.slice(ERR_MARKER.length).trim(), line, command);
  }

  throw new Pop3ProtocolError(
    line.length === 0 ? 'Empty status line' : `Unrecognised status line: ${line}`,
    line,
    command
  );
}

/**
 * Error for a stream that closed where a status line was expected
 */
function closedError(source: LineSource | LineChannel, command?: string): Error {
  const error = new Pop3ConnectionError(
    'Connection closed by server',
    'host' in source ? source.host : '',
    'port' in source ? source.port : 0
  );
  error.command = command;
  return error;
}

/**
 * Reads and parses a single-line reply
 *
 * @throws Pop3ConnectionError if the stream ends before a line arrives
 */
export async function readShort(source: LineSource, command?: string): Promise<Pop3Response> {
  const line = await source.readLine();
  if (line === null) {
    throw closedError(source, command);
  }
  return parseShort(line, command);
}

/**
 * Reads and parses a multi-line reply
 *
 * The status line is handled as in readShort. Body lines follow until a
 * line that is exactly "."; stuffed lines have their first dot removed.
 *
 * @throws Pop3ProtocolError if the stream ends before the terminator
 */
export async function parseLong(source: LineSource, command?: string): Promise<Pop3Response> {
  const { status } = await readShort(source, command);
  const body: string[] = [];

  for (;;) {
    const line = await source.readLine();

    if (line === null) {
      throw new Pop3ProtocolError('unexpected end of stream', body.join('\r\n'), command);
    }
    if (isTerminator(line)) {
      break;
    }

    body.push(unstuffLine(line));
  }

  return createResponse(status, body);
}
