/**
 * Transport layer exports for pop3-client
 */

export { Pop3Connection, isTlsAvailable, buildTlsOptions } from './connection.js';
export type { ConnectionState } from './connection.js';
export { LineReader } from './line-reader.js';
export type { LineChannel, LineSource } from './channel.js';
