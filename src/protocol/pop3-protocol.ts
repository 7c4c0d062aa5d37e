/**
 * POP3 Protocol Layer
 *
 * Wraps a line channel and provides lock-step command execution:
 * one command is written, its full reply is read, and only then may the
 * next command start.
 *
 * @packageDocumentation
 */

import type { Logger } from 'pino';
import type { LineChannel } from '../transport/channel.js';
import type { Pop3Command, Pop3Response } from '../types/protocol.js';
import { formatCommand, redactCommand, responseKind } from '../commands/builder.js';
import { parseLong, readShort } from './parser.js';

/**
 * Pop3Protocol class wrapping a line channel
 * Formats commands, sends them and parses the matching reply.
 */
export class Pop3Protocol {
  private channel: LineChannel;
  private logger: Logger;

  constructor(channel: LineChannel, logger: Logger) {
    this.channel = channel;
    this.logger = logger;
  }

  /**
   * Read the server greeting
   */
  async readGreeting(): Promise<Pop3Response> {
    const response = await readShort(this.channel);
    this.logger.debug({ status: response.status }, 'greeting');
    return response;
  }

  /**
   * Send a command and read a single-line reply
   *
   * @throws Pop3ServerError if the server answers -ERR
   */
  async shortCommand(command: Pop3Command): Promise<Pop3Response> {
    await this.send(command);
    const response = await readShort(this.channel, command.verb);
    this.logger.debug({ command: command.verb, status: response.status }, 'short reply');
    return response;
  }

  /**
   * Send a command and read a multi-line reply
   *
   * @throws Pop3ServerError if the server answers -ERR
   * @throws Pop3ProtocolError if the stream ends before the terminator
   */
  async longCommand(command: Pop3Command): Promise<Pop3Response> {
    await this.send(command);
    const response = await parseLong(this.channel, command.verb);
    this.logger.debug(
      { command: command.verb, status: response.status, lines: response.body.length },
      'long reply'
    );
    return response;
  }

  /**
   * Execute a command with the reply shape its verb and arguments call for
   */
  execute(command: Pop3Command): Promise<Pop3Response> {
    return responseKind(command) === 'long'
      ? this.longCommand(command)
      : this.shortCommand(command);
  }

  private async send(command: Pop3Command): Promise<void> {
    this.logger.debug({ command: redactCommand(command) }, 'send');
    await this.channel.writeLine(formatCommand(command));
  }
}
