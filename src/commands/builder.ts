/**
 * POP3 Command Builder
 *
 * Builds POP3 commands according to RFC 1939 and formats them for the wire.
 *
 * @packageDocumentation
 */

import type { Pop3Command, Pop3Verb, ResponseKind } from '../types/protocol.js';

/**
 * Verbs whose reply is always a multi-line block
 */
const LONG_VERBS: ReadonlySet<Pop3Verb> = new Set<Pop3Verb>(['RETR', 'TOP', 'CAPA']);

/**
 * Verbs whose reply is multi-line only when issued without a message number
 */
const LISTING_VERBS: ReadonlySet<Pop3Verb> = new Set<Pop3Verb>(['LIST', 'UIDL']);

/**
 * Verbs whose arguments must never reach a log
 */
const SECRET_VERBS: ReadonlySet<Pop3Verb> = new Set<Pop3Verb>(['PASS', 'APOP']);

/**
 * Rejects arguments that would break the line framing
 */
function checkArgument(value: string, name: string): string {
  if (/[\r\n]/.test(value)) {
    throw new TypeError(`${name} must not contain CR or LF`);
  }
  return value;
}

function checkMessageNumber(value: number): string {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`Message number must be a positive integer, got ${value}`);
  }
  return String(value);
}

function checkLineCount(value: number): string {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`Line count must be a non-negative integer, got ${value}`);
  }
  return String(value);
}

function command(verb: Pop3Verb, ...args: string[]): Pop3Command {
  return { verb, args };
}

/**
 * Which reply shape a command expects
 */
export function responseKind(cmd: Pop3Command): ResponseKind {
  if (LONG_VERBS.has(cmd.verb)) {
    return 'long';
  }
  if (LISTING_VERBS.has(cmd.verb) && cmd.args.length === 0) {
    return 'long';
  }
  return 'short';
}

/**
 * Formats a command as sent on the wire, without CRLF
 */
export function formatCommand(cmd: Pop3Command): string {
  return [cmd.verb, ...cmd.args].join(' ');
}

/**
 * Formats a command for logging, with credentials masked
 */
export function redactCommand(cmd: Pop3Command): string {
  if (SECRET_VERBS.has(cmd.verb) && cmd.args.length > 0) {
    const masked = cmd.verb === 'APOP' ? [cmd.args[0], '****'] : ['****'];
    return [cmd.verb, ...masked].join(' ');
  }
  return formatCommand(cmd);
}

/**
 * CommandBuilder class with static methods for building POP3 commands
 */
export class CommandBuilder {
  /**
   * Builds a USER command
   *
   * @param name - Mailbox user name
   */
  static user(name: string): Pop3Command {
    return command('USER', checkArgument(name, 'User name'));
  }

  /**
   * Builds a PASS command
   *
   * @param password - Mailbox password
   */
  static pass(password: string): Pop3Command {
    return command('PASS', checkArgument(password, 'Password'));
  }

  /**
   * Builds an APOP command
   *
   * @param name - Mailbox user name
   * @param digest - Lowercase hex MD5 digest of the banner timestamp and shared secret
   */
  static apop(name: string, digest: string): Pop3Command {
    return command('APOP', checkArgument(name, 'User name'), checkArgument(digest, 'Digest'));
  }

  static stat(): Pop3Command {
    return command('STAT');
  }

  /**
   * Builds a LIST command; without a message number the whole maildrop is listed
   */
  static list(messageNumber?: number): Pop3Command {
    return messageNumber === undefined
      ? command('LIST')
      : command('LIST', checkMessageNumber(messageNumber));
  }

  static retr(messageNumber: number): Pop3Command {
    return command('RETR', checkMessageNumber(messageNumber));
  }

  static dele(messageNumber: number): Pop3Command {
    return command('DELE', checkMessageNumber(messageNumber));
  }

  static noop(): Pop3Command {
    return command('NOOP');
  }

  static rset(): Pop3Command {
    return command('RSET');
  }

  static quit(): Pop3Command {
    return command('QUIT');
  }

  /**
   * Builds a TOP command returning the headers and the first lines of a message
   *
   * @param messageNumber - Message to read
   * @param maxLines - Number of body lines after the header block
   */
  static top(messageNumber: number, maxLines: number): Pop3Command {
    return command('TOP', checkMessageNumber(messageNumber), checkLineCount(maxLines));
  }

  /**
   * Builds a UIDL command; without a message number every message is listed
   */
  static uidl(messageNumber?: number): Pop3Command {
    return messageNumber === undefined
      ? command('UIDL')
      : command('UIDL', checkMessageNumber(messageNumber));
  }

  static capa(): Pop3Command {
    return command('CAPA');
  }
}
