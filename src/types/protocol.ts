/**
 * Protocol types for pop3-client
 */

/**
 * Command verbs understood by the client
 */
export type Pop3Verb =
  | 'USER'
  | 'PASS'
  | 'APOP'
  | 'STAT'
  | 'LIST'
  | 'RETR'
  | 'DELE'
  | 'NOOP'
  | 'RSET'
  | 'QUIT'
  | 'TOP'
  | 'UIDL'
  | 'CAPA';

/**
 * Whether a command is answered by a single status line or by a
 * dot-terminated multi-line block
 */
export type ResponseKind = 'short' | 'long';

/**
 * A command ready to be sent
 */
export interface Pop3Command {
  /** Protocol verb */
  verb: Pop3Verb;
  /** Arguments, sent space-separated after the verb */
  args: readonly string[];
}

/**
 * Parsed server reply
 */
export interface Pop3Response {
  /** Text following the +OK marker, trimmed */
  readonly status: string;
  /** Body lines of a multi-line reply, unstuffed; empty for single-line replies */
  readonly body: readonly string[];
}

/**
 * Session phase
 */
export type SessionState = 'authorization' | 'transaction' | 'update' | 'closed';

/**
 * Mailbox status returned by STAT
 */
export interface StatResult {
  /** Number of messages in the maildrop */
  count: number;
  /** Total size in octets */
  size: number;
}

/**
 * One LIST entry
 */
export interface ScanListing {
  messageNumber: number;
  /** Message size in octets */
  size: number;
}

/**
 * One UIDL entry
 */
export interface UniqueIdListing {
  messageNumber: number;
  uid: string;
}
