/**
 * POP3 Response Parser
 *
 * Parses the status text and body lines of specific commands into
 * structured objects. Handles STAT, LIST and UIDL replies and the APOP
 * timestamp carried by the greeting.
 *
 * @packageDocumentation
 */

import type { Pop3Response, ScanListing, StatResult, UniqueIdListing } from '../types/protocol.js';
import { Pop3FormatError } from '../types/errors.js';

const DIGITS = /^\d+$/;

/**
 * Splits text into non-empty whitespace separated tokens
 */
function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter(token => token.length > 0);
}

function toInteger(token: string, text: string, command: string): number {
  if (!DIGITS.test(token)) {
    throw new Pop3FormatError(`${command}: expected a number, got "${token}"`, text, command);
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    throw new Pop3FormatError(`${command}: number out of range "${token}"`, text, command);
  }
  return value;
}

/**
 * ResponseParser class for parsing POP3 command replies
 */
export class ResponseParser {
  /**
   * Parses the status text of a STAT reply
   *
   * STAT replies have the format: +OK count size
   *
   * @param status - Status text (e.g., "3 1234")
   * @throws Pop3FormatError unless the text is exactly two non-negative integers
   */
  static parseStat(status: string): StatResult {
    const tokens = splitTokens(status);
    if (tokens.length !== 2) {
      throw new Pop3FormatError(`STAT: expected 2 fields, got ${tokens.length}`, status, 'STAT');
    }

    return {
      count: toInteger(tokens[0], status, 'STAT'),
      size: toInteger(tokens[1], status, 'STAT')
    };
  }

  /**
   * Parses one scan listing: "msg size"
   *
   * Used both for LIST body lines and for the status text of LIST n.
   * Servers may append information after the size; it is ignored.
   */
  static parseScanListing(line: string): ScanListing {
    const tokens = splitTokens(line);
    if (tokens.length < 2) {
      throw new Pop3FormatError(`LIST: malformed scan listing "${line}"`, line, 'LIST');
    }

    return {
      messageNumber: toInteger(tokens[0], line, 'LIST'),
      size: toInteger(tokens[1], line, 'LIST')
    };
  }

  /**
   * Parses the body of a multi-line LIST reply
   */
  static parseListing(response: Pop3Response): ScanListing[] {
    return response.body.map(line => this.parseScanListing(line));
  }

  /**
   * Parses one unique-id listing: "msg uid"
   *
   * Used both for UIDL body lines and for the status text of UIDL n.
   */
  static parseUniqueIdListing(line: string): UniqueIdListing {
    const tokens = splitTokens(line);
    if (tokens.length !== 2) {
      throw new Pop3FormatError(`UIDL: malformed unique-id listing "${line}"`, line, 'UIDL');
    }

    return {
      messageNumber: toInteger(tokens[0], line, 'UIDL'),
      uid: tokens[1]
    };
  }

  /**
   * Parses the body of a multi-line UIDL reply
   */
  static parseUidListing(response: Pop3Response): UniqueIdListing[] {
    return response.body.map(line => this.parseUniqueIdListing(line));
  }

  /**
   * Extracts the APOP timestamp ("<process-ID.clock@hostname>") from a greeting banner
   *
   * @returns The timestamp including its angle brackets, or null if the server offers none
   */
  static extractApopTimestamp(banner: string): string | null {
    const match = banner.match(/<[^<>\s]+>/);
    return match ? match[0] : null;
  }
}
