/**
 * Type exports for pop3-client
 */

// Configuration types
export type { Pop3Config, TlsOptions, VerifyMode, ConnectionOptions } from './config.js';

// Protocol types
export type {
  Pop3Verb,
  Pop3Command,
  Pop3Response,
  ResponseKind,
  SessionState,
  StatResult,
  ScanListing,
  UniqueIdListing
} from './protocol.js';

// Error types
export {
  Pop3Error,
  Pop3ConnectionError,
  Pop3TimeoutError,
  Pop3ProtocolError,
  Pop3ServerError,
  Pop3FormatError,
  Pop3StateError,
  isPop3Error,
  isFatalError
} from './errors.js';

export type { ErrorSource, AnyPop3Error } from './errors.js';
