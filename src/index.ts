/**
 * pop3-client - A TypeScript POP3 client library
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export protocol layer
export * from './protocol/index.js';

// Export command layer
export * from './commands/index.js';

// Export transport layer
export * from './transport/index.js';

export { createLogger, resolveLogLevel } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';

// Public API
export { Pop3Client, normalizeConfig, DEFAULT_PORT, DEFAULT_TLS_PORT } from './client.js';
