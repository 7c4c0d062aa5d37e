/**
 * Line channel contract shared by the transport and the protocol layer
 */

/**
 * Source of CRLF-framed lines
 */
export interface LineSource {
  /**
   * Read the next line with its terminator stripped.
   * Resolves to null once the peer has closed the stream.
   */
  readLine(): Promise<string | null>;
}

/**
 * Bidirectional line-oriented channel to a POP3 server
 */
export interface LineChannel extends LineSource {
  /** Host the channel talks to */
  readonly host: string;
  /** Port the channel talks to */
  readonly port: number;
  /** Whether the channel is open for reading and writing */
  readonly isOpen: boolean;
  /** Establish the underlying stream */
  open(): Promise<void>;
  /** Send a line; CRLF is appended */
  writeLine(line: string): Promise<void>;
  /** Release the underlying stream. Safe to call more than once. */
  close(): Promise<void>;
}
