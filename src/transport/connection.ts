/**
 * Transport layer for pop3-client
 * Manages TCP/TLS socket connections to POP3 servers
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import * as tls from 'tls';
import type { ConnectionOptions, TlsOptions } from '../types/config.js';
import { Pop3ConnectionError, Pop3TimeoutError } from '../types/errors.js';
import type { LineChannel } from './channel.js';
import { LineReader } from './line-reader.js';

/**
 * Connection state
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting';

/**
 * Whether the running Node build can open TLS connections
 */
export function isTlsAvailable(): boolean {
  return typeof process.versions.openssl === 'string' && process.versions.openssl.length > 0;
}

/**
 * Build Node TLS options from configuration.
 * Certificate verification is always set explicitly.
 */
export function buildTlsOptions(options: TlsOptions, host: string): tls.ConnectionOptions {
  const opts: tls.ConnectionOptions = {
    rejectUnauthorized: (options.verify ?? 'verify-peer') === 'verify-peer',
    servername: options.servername ?? (net.isIP(host) === 0 ? host : undefined)
  };

  if (options.ca) {
    opts.ca = options.ca;
  }
  if (options.cert) {
    opts.cert = options.cert;
  }
  if (options.key) {
    opts.key = options.key;
  }
  if (options.minVersion) {
    opts.minVersion = options.minVersion;
  }

  return opts;
}

/**
 * Socket-backed line channel
 * Handles TCP/TLS socket management and CRLF line framing
 */
export class Pop3Connection extends EventEmitter implements LineChannel {
  private socket: net.Socket | tls.TLSSocket | null = null;
  private options: ConnectionOptions;
  private _state: ConnectionState = 'disconnected';
  private reader: LineReader = new LineReader();

  constructor(options: ConnectionOptions) {
    super();
    this.options = options;
  }

  /**
   * Current connection state
   */
  get state(): ConnectionState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === 'connected';
  }

  get host(): string {
    return this.options.host;
  }

  get port(): number {
    return this.options.port;
  }

  /**
   * Establish connection to the POP3 server
   * @throws Pop3ConnectionError on connection failure
   * @throws Pop3TimeoutError if connection times out
   */
  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this._state !== 'disconnected') {
        reject(new Pop3ConnectionError(
          `Cannot connect: connection is ${this._state}`,
          this.options.host,
          this.options.port
        ));
        return;
      }

      if (this.options.tls && !isTlsAvailable()) {
        reject(new Pop3ConnectionError('encryption unsupported', this.options.host, this.options.port));
        return;
      }

      this._state = 'connecting';
      this.reader = new LineReader();
      let timeoutId: NodeJS.Timeout | null = null;
      let settled = false;

      const cleanup = () => {
        if (timeoutId) {
          clearTimeout(timeoutId);
          timeoutId = null;
        }
      };

      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        this.socket?.destroy();
        this._state = 'disconnected';
        this.socket = null;
        reject(new Pop3ConnectionError(
          `Connection failed: ${err.message}`,
          this.options.host,
          this.options.port,
          err
        ));
      };

      const onConnect = () => {
        if (settled) return;
        settled = true;
        cleanup();
        this._state = 'connected';
        this.setupSocketListeners();
        this.emit('connect');
        resolve();
      };

      if (this.options.connTimeout > 0) {
        timeoutId = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.socket?.destroy();
          this.socket = null;
          this._state = 'disconnected';
          reject(new Pop3TimeoutError(
            `Connection timed out after ${this.options.connTimeout}ms`,
            this.options.host,
            this.options.port,
            'connect',
            this.options.connTimeout
          ));
        }, this.options.connTimeout);
      }

      try {
        if (this.options.tls) {
          this.socket = tls.connect({
            host: this.options.host,
            port: this.options.port,
            ...buildTlsOptions(this.options.tlsOptions, this.options.host)
          }, onConnect);
        } else {
          this.socket = net.createConnection({
            host: this.options.host,
            port: this.options.port
          }, onConnect);
        }

        this.socket.once('error', onError);
      } catch (err) {
        onError(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  /**
   * Setup socket event listeners after connection
   */
  private setupSocketListeners(): void {
    if (!this.socket) return;

    // Remove the one-time error handler from open()
    this.socket.removeAllListeners('error');

    this.socket.on('data', (chunk: Buffer) => {
      this.reader.push(chunk);
    });

    this.socket.on('error', (err: Error) => {
      const connectionError = new Pop3ConnectionError(
        `Socket error: ${err.message}`,
        this.options.host,
        this.options.port,
        err
      );
      this.reader.fail(connectionError);
      // The failure already reaches the pending read; only re-emit to listeners
      if (this.listenerCount('error') > 0) {
        this.emit('error', connectionError);
      }
    });

    this.socket.on('end', () => {
      // Server closed its side; buffered lines can still be read
      this.reader.end();
    });

    this.socket.on('close', () => {
      this.reader.end();
      this._state = 'disconnected';
      this.socket = null;
      this.emit('close');
    });
  }

  /**
   * Read the next line, bounded by the idle timeout
   * @returns The line without its terminator, or null once the server closed the stream
   * @throws Pop3TimeoutError if no line arrives in time
   */
  readLine(): Promise<string | null> {
    return this.reader.read(this.options.timeout, () => new Pop3TimeoutError(
      `No reply within ${this.options.timeout}ms`,
      this.options.host,
      this.options.port,
      'read',
      this.options.timeout
    ));
  }

  /**
   * Send a line of data (appends CRLF)
   * @throws Pop3ConnectionError if not connected or the write fails
   */
  writeLine(line: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = this.socket;
      if (!socket || this._state !== 'connected') {
        reject(new Pop3ConnectionError(
          'Cannot send data: not connected',
          this.options.host,
          this.options.port
        ));
        return;
      }

      socket.write(`${line}\r\n`, (err) => {
        if (err) {
          reject(new Pop3ConnectionError(
            `Write failed: ${err.message}`,
            this.options.host,
            this.options.port,
            err
          ));
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Disconnect from the POP3 server
   * @returns Promise that resolves when disconnected
   */
  close(): Promise<void> {
    return new Promise((resolve) => {
      const socket = this.socket;
      if (this._state === 'disconnected' || !socket) {
        this._state = 'disconnected';
        resolve();
        return;
      }

      this._state = 'disconnecting';
      this.reader.fail(new Pop3ConnectionError(
        'Connection closed',
        this.options.host,
        this.options.port
      ));

      if (socket.destroyed) {
        this._state = 'disconnected';
        this.socket = null;
        resolve();
        return;
      }

      // Force destroy after a short timeout if graceful close doesn't work
      const forceTimer = setTimeout(() => {
        if (!socket.destroyed) {
          socket.destroy();
        }
      }, 1000);

      socket.once('close', () => {
        clearTimeout(forceTimer);
        resolve();
      });
      socket.end();
    });
  }
}
