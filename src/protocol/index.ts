/**
 * Protocol layer exports for pop3-client
 */

export {
  OK_MARKER,
  ERR_MARKER,
  TERMINATOR,
  parseShort,
  readShort,
  parseLong,
  isOkResponse,
  isErrResponse,
  isTerminator,
  unstuffLine,
  stuffLine
} from './parser.js';

export { ResponseParser } from './response-parser.js';

export { SessionStateMachine } from './session-state.js';

export { Pop3Protocol } from './pop3-protocol.js';
