/**
 * Pop3Client - Public API for pop3-client
 *
 * Provides a Promise-based API for POP3 mailbox retrieval.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { Pop3Connection, isTlsAvailable } from './transport/connection.js';
import type { LineChannel } from './transport/channel.js';
import { Pop3Protocol } from './protocol/pop3-protocol.js';
import { SessionStateMachine } from './protocol/session-state.js';
import { ResponseParser } from './protocol/response-parser.js';
import { CommandBuilder } from './commands/builder.js';
import { apopDigest } from './commands/apop.js';
import { createLogger } from './utils/logger.js';
import type { Pop3Config, ConnectionOptions } from './types/config.js';
import type { Pop3Command, Pop3Response, Pop3Verb, SessionState, StatResult } from './types/protocol.js';
import {
  Pop3ConnectionError,
  Pop3FormatError,
  Pop3ProtocolError,
  Pop3ServerError,
  Pop3StateError,
  isFatalError
} from './types/errors.js';

/**
 * Default configuration values
 */
export const DEFAULT_PORT = 110;
export const DEFAULT_TLS_PORT = 995;
const DEFAULT_TLS = true;
const DEFAULT_TIMEOUT = 30000;
const DEFAULT_CONN_TIMEOUT = 30000;

/**
 * Fills in defaults and produces the options the transport needs
 */
export function normalizeConfig(config: Pop3Config): ConnectionOptions {
  const tls = config.tls ?? DEFAULT_TLS;

  return {
    host: config.host,
    port: config.port ?? (tls ? DEFAULT_TLS_PORT : DEFAULT_PORT),
    tls,
    tlsOptions: {
      ...config.tlsOptions,
      verify: config.tlsOptions?.verify ?? 'verify-peer'
    },
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    connTimeout: config.connTimeout ?? DEFAULT_CONN_TIMEOUT
  };
}

interface ClientParts {
  options: ConnectionOptions;
  channel: LineChannel;
  protocol: Pop3Protocol;
  logger: Logger;
  banner: string;
}

/**
 * Pop3Client provides a high-level, Promise-based API for POP3 operations.
 *
 * A client only exists once the server greeting has been read. It owns its
 * channel and releases it on QUIT, on a connection-ending error, or on close().
 *
 * @example
 * ```typescript
 * const client = await Pop3Client.connect({ host: 'pop.example.com' });
 *
 * await client.user('alice');
 * await client.pass('test-secret');
 * const { count } = await client.stat();
 * const message = await client.retr(1);
 * await client.quit();
 * ```
 */
export class Pop3Client extends EventEmitter {
  /** Server host */
  readonly host: string;
  /** Server port */
  readonly port: number;
  /** Whether the channel is TLS-wrapped */
  readonly tls: boolean;
  /** Greeting status text, as sent by the server */
  readonly banner: string;

  private channel: LineChannel;
  private protocol: Pop3Protocol;
  private logger: Logger;
  private session: SessionStateMachine = new SessionStateMachine();
  private inFlight: Pop3Verb | null = null;
  private closing: Promise<void> | null = null;

  private constructor(parts: ClientParts) {
    super();
    this.host = parts.options.host;
    this.port = parts.options.port;
    this.tls = parts.options.tls;
    this.banner = parts.banner;
    this.channel = parts.channel;
    this.protocol = parts.protocol;
    this.logger = parts.logger;
  }

  /**
   * Current session phase
   */
  get state(): SessionState {
    return this.session.state;
  }

  /**
   * Whether the client can still talk to the server
   */
  get isConnected(): boolean {
    return !this.session.isClosed && this.channel.isOpen;
  }

  /**
   * Connects to the server and reads its greeting.
   *
   * @param config - Connection configuration
   * @param channel - Line channel to use instead of a TCP/TLS socket
   * @returns Promise resolving to a client in the authorization state
   * @throws Pop3ConnectionError if TLS is unavailable or the connection fails
   * @throws Pop3ProtocolError if the greeting is not a +OK line
   */
  static async connect(config: Pop3Config, channel?: LineChannel): Promise<Pop3Client> {
    const options = normalizeConfig(config);
    const logger = createLogger(config.logger).child({ host: options.host, port: options.port });

    if (options.tls && !isTlsAvailable()) {
      throw new Pop3ConnectionError('encryption unsupported', options.host, options.port);
    }

    const transport = channel ?? new Pop3Connection(options);
    await transport.open();

    const protocol = new Pop3Protocol(transport, logger);
    let greeting: Pop3Response;
    try {
      greeting = await protocol.readGreeting();
    } catch (err) {
      await transport.close();
      if (err instanceof Pop3ServerError) {
        throw new Pop3ProtocolError(`Server rejected connection: ${err.message}`, err.serverResponse);
      }
      throw err;
    }

    logger.info({ tls: options.tls }, 'connected');

    return new Pop3Client({
      options,
      channel: transport,
      protocol,
      logger,
      banner: greeting.status
    });
  }

  /**
   * Connects, hands the client to operation, and releases the connection
   * afterwards whether or not operation succeeded.
   * Call quit() inside operation to commit deletions.
   */
  static async withSession<T>(
    config: Pop3Config,
    operation: (client: Pop3Client) => Promise<T>,
    channel?: LineChannel
  ): Promise<T> {
    const client = await Pop3Client.connect(config, channel);
    try {
      return await operation(client);
    } finally {
      await client.close();
    }
  }

  /**
   * USER, send the user name
   */
  async user(name: string): Promise<Pop3Response> {
    const response = await this.authStep(CommandBuilder.user(name));
    this.session.userOk();
    return response;
  }

  /**
   * PASS, send the password. On success the session enters the transaction state.
   */
  async pass(password: string): Promise<Pop3Response> {
    const response = await this.authStep(CommandBuilder.pass(password));
    this.session.authenticated();
    return response;
  }

  /**
   * APOP, authenticate with a digest of the greeting timestamp and a shared secret
   *
   * @throws Pop3FormatError if the greeting carries no timestamp
   */
  async apop(name: string, secret: string): Promise<Pop3Response> {
    this.session.assertCanIssue('APOP');

    const timestamp = ResponseParser.extractApopTimestamp(this.banner);
    if (timestamp === null) {
      throw new Pop3FormatError('Greeting banner carries no APOP timestamp', this.banner, 'APOP');
    }

    const response = await this.authStep(CommandBuilder.apop(name, apopDigest(timestamp, secret)));
    this.session.authenticated();
    return response;
  }

  /**
   * STAT, get mailbox status
   *
   * @throws Pop3FormatError if the reply is not two integers
   */
  async stat(): Promise<StatResult> {
    const response = await this.run(CommandBuilder.stat());
    return ResponseParser.parseStat(response.status);
  }

  /**
   * LIST, request a scan listing of every message (multi-line) or of one message
   */
  async list(messageNumber?: number): Promise<Pop3Response> {
    return this.run(CommandBuilder.list(messageNumber));
  }

  /**
   * RETR, retrieve a message
   */
  async retr(messageNumber: number): Promise<Pop3Response> {
    return this.run(CommandBuilder.retr(messageNumber));
  }

  /**
   * DELE, mark a message for deletion
   */
  async dele(messageNumber: number): Promise<Pop3Response> {
    return this.run(CommandBuilder.dele(messageNumber));
  }

  /**
   * NOOP, do nothing
   */
  async noop(): Promise<Pop3Response> {
    return this.run(CommandBuilder.noop());
  }

  /**
   * RSET, unmark messages marked for deletion
   */
  async rset(): Promise<Pop3Response> {
    return this.run(CommandBuilder.rset());
  }

  /**
   * TOP, retrieve the headers and the first maxLines body lines of a message
   */
  async top(messageNumber: number, maxLines: number): Promise<Pop3Response> {
    return this.run(CommandBuilder.top(messageNumber, maxLines));
  }

  /**
   * UIDL, unique-id listing of every message (multi-line) or of one message
   */
  async uidl(messageNumber?: number): Promise<Pop3Response> {
    return this.run(CommandBuilder.uidl(messageNumber));
  }

  /**
   * CAPA, return server capabilities
   */
  async capa(): Promise<string[]> {
    const response = await this.run(CommandBuilder.capa());
    return [...response.body];
  }

  /**
   * QUIT, commit changes, unlock the maildrop and close the connection.
   * The connection is closed whatever the reply.
   */
  async quit(): Promise<Pop3Response> {
    this.assertReady('QUIT');
    this.session.quitting();
    this.inFlight = 'QUIT';

    try {
      return await this.protocol.shortCommand(CommandBuilder.quit());
    } finally {
      this.inFlight = null;
      await this.release();
    }
  }

  /**
   * Releases the connection without sending QUIT; messages marked for
   * deletion stay in the maildrop. Safe to call more than once.
   */
  async close(): Promise<void> {
    await this.release();
  }

  /**
   * Runs an authorization command; a -ERR reply restarts authorization
   */
  private async authStep(command: Pop3Command): Promise<Pop3Response> {
    try {
      return await this.run(command);
    } catch (err) {
      if (err instanceof Pop3ServerError) {
        this.session.authFailed();
      }
      throw err;
    }
  }

  /**
   * Sends a command after checking the session allows it.
   * Connection-ending failures release the channel before rejecting.
   */
  private async run(command: Pop3Command): Promise<Pop3Response> {
    this.assertReady(command.verb);
    this.inFlight = command.verb;

    try {
      return await this.protocol.execute(command);
    } catch (err) {
      if (isFatalError(err)) {
        this.logger.warn({ command: command.verb, err }, 'closing connection after error');
        await this.release();
      }
      throw err;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * @throws Pop3StateError if the phase forbids verb or another command is awaiting its reply
   */
  private assertReady(verb: Pop3Verb): void {
    this.session.assertCanIssue(verb);

    if (this.inFlight !== null) {
      throw new Pop3StateError(
        `Cannot issue ${verb}: ${this.inFlight} is still waiting for its reply`,
        this.session.state,
        verb
      );
    }
  }

  private release(): Promise<void> {
    if (!this.closing) {
      this.session.closed();
      this.closing = this.channel.close().then(() => {
        this.logger.info('connection closed');
        this.emit('close');
      });
    }
    return this.closing;
  }
}
