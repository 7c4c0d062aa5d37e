/**
 * Scripted in-process stand-in for a POP3 server
 */

import { LineReader } from '../../src/transport/line-reader.js';
import type { LineChannel, LineSource } from '../../src/transport/channel.js';
import { Pop3ConnectionError } from '../../src/types/errors.js';

/**
 * Reply for a command line: raw wire text, null to drop the connection,
 * text followed by the server closing the stream, or a transport failure
 */
export type ScriptedReply =
  | string
  | null
  | { data: string; thenClose: true }
  | { fail: Error };

export interface MockChannelOptions {
  /** Raw greeting text, or null to close before greeting */
  greeting: ScriptedReply;
  /** Replies keyed by the exact command line the client sends */
  replies?: Record<string, ScriptedReply>;
}

export class MockChannel implements LineChannel {
  readonly host = 'pop.test';
  readonly port = 110;
  readonly sent: string[] = [];
  openCount = 0;
  closeCount = 0;

  private reader = new LineReader();
  private connected = false;
  private greeting: ScriptedReply;
  private replies: Record<string, ScriptedReply>;

  constructor(options: MockChannelOptions) {
    this.greeting = options.greeting;
    this.replies = options.replies ?? {};
  }

  get isOpen(): boolean {
    return this.connected;
  }

  async open(): Promise<void> {
    this.openCount++;
    this.connected = true;
    this.deliver(this.greeting);
  }

  async writeLine(line: string): Promise<void> {
    if (!this.connected) {
      throw new Pop3ConnectionError('Cannot send data: not connected', this.host, this.port);
    }
    this.sent.push(line);

    if (!(line in this.replies)) {
      this.deliver(`-ERR unscripted command ${line}\r\n`);
      return;
    }
    this.deliver(this.replies[line]);
  }

  readLine(): Promise<string | null> {
    return this.reader.read();
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.connected = false;
    this.reader.fail(new Pop3ConnectionError('Connection closed', this.host, this.port));
  }

  private deliver(reply: ScriptedReply): void {
    if (reply === null) {
      this.reader.end();
    } else if (typeof reply === 'string') {
      this.reader.push(toWire(reply));
    } else if ('fail' in reply) {
      this.reader.fail(reply.fail);
    } else {
      this.reader.push(toWire(reply.data));
      this.reader.end();
    }
  }
}

/**
 * Wire bytes for scripted text, one octet per code unit
 */
function toWire(text: string): Buffer {
  return Buffer.from(text, 'latin1');
}

/**
 * A line source that yields the lines of text and then end of stream
 */
export function sourceOf(text: string): LineSource {
  const reader = new LineReader();
  reader.push(toWire(text));
  reader.end();
  return { readLine: () => reader.read() };
}
