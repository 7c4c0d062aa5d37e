/**
 * Command layer exports for pop3-client
 */

export { CommandBuilder, responseKind, formatCommand, redactCommand } from './builder.js';
export { apopDigest } from './apop.js';
