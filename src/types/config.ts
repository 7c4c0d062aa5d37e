/**
 * Configuration types for pop3-client
 */

import type { Logger } from 'pino';

/**
 * Certificate verification policy
 */
export type VerifyMode = 'verify-peer' | 'no-verify';

/**
 * TLS/SSL options for secure connections
 */
export interface TlsOptions {
  /** Certificate verification policy (default: 'verify-peer') */
  verify?: VerifyMode;
  /** Certificate authority chain */
  ca?: string | Buffer | Array<string | Buffer>;
  /** Client certificate */
  cert?: string | Buffer;
  /** Client private key */
  key?: string | Buffer;
  /** Server name for SNI (Server Name Indication) */
  servername?: string;
  /** Minimum TLS version to negotiate */
  minVersion?: 'TLSv1' | 'TLSv1.1' | 'TLSv1.2' | 'TLSv1.3';
}

/**
 * POP3 connection configuration
 */
export interface Pop3Config {
  /** POP3 server hostname */
  host: string;
  /** POP3 server port (default: 995 for TLS, 110 for plain) */
  port?: number;
  /** Whether to use TLS/SSL (default: true) */
  tls?: boolean;
  /** TLS options for secure connections */
  tlsOptions?: TlsOptions;
  /** Idle timeout for each reply line in milliseconds (default: 30000) */
  timeout?: number;
  /** Connection timeout in milliseconds (default: 30000) */
  connTimeout?: number;
  /**
   * pino logger to write diagnostics to, or false to disable logging.
   * When omitted a logger is created at the level in POP3_LOG_LEVEL (default: silent).
   */
  logger?: Logger | false;
}

/**
 * Internal connection options
 */
export interface ConnectionOptions {
  host: string;
  port: number;
  tls: boolean;
  tlsOptions: TlsOptions;
  timeout: number;
  connTimeout: number;
}
