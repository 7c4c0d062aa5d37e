/**
 * POP3 session state machine
 *
 * Tracks the session phase (RFC 1939 section 3) and rejects commands the
 * current phase does not allow before anything is written to the server.
 *
 * @packageDocumentation
 */

import type { Pop3Verb, SessionState } from '../types/protocol.js';
import { Pop3StateError } from '../types/errors.js';

/**
 * Verbs accepted in each phase
 */
const ALLOWED_VERBS: Readonly<Record<SessionState, ReadonlySet<Pop3Verb>>> = {
  authorization: new Set<Pop3Verb>(['USER', 'PASS', 'APOP', 'CAPA', 'QUIT']),
  transaction: new Set<Pop3Verb>([
    'STAT', 'LIST', 'RETR', 'DELE', 'NOOP', 'RSET', 'TOP', 'UIDL', 'CAPA', 'QUIT'
  ]),
  update: new Set<Pop3Verb>(),
  closed: new Set<Pop3Verb>()
};

/**
 * SessionStateMachine with checked transitions
 */
export class SessionStateMachine {
  private _state: SessionState = 'authorization';
  private userAccepted: boolean = false;

  /**
   * Current session phase
   */
  get state(): SessionState {
    return this._state;
  }

  get isClosed(): boolean {
    return this._state === 'closed';
  }

  /**
   * Whether verb may be issued now
   */
  canIssue(verb: Pop3Verb): boolean {
    if (!ALLOWED_VERBS[this._state].has(verb)) {
      return false;
    }
    // PASS only follows an accepted USER
    return verb !== 'PASS' || this.userAccepted;
  }

  /**
   * @throws Pop3StateError if verb may not be issued now
   */
  assertCanIssue(verb: Pop3Verb): void {
    if (this.canIssue(verb)) {
      return;
    }

    const reason = this._state === 'closed'
      ? 'session is closed'
      : verb === 'PASS' && this._state === 'authorization'
        ? 'PASS must follow an accepted USER'
        : `not allowed in ${this._state} state`;

    throw new Pop3StateError(`Cannot issue ${verb}: ${reason}`, this._state, verb);
  }

  /**
   * The server accepted USER
   */
  userOk(): void {
    this.expect('authorization', 'USER');
    this.userAccepted = true;
  }

  /**
   * The server rejected USER or PASS; authorization starts over
   */
  authFailed(): void {
    this.userAccepted = false;
  }

  /**
   * The server accepted PASS or APOP
   */
  authenticated(): void {
    this.expect('authorization', 'PASS');
    this.userAccepted = false;
    this._state = 'transaction';
  }

  /**
   * QUIT was sent; the reply is outstanding
   */
  quitting(): void {
    this.assertCanIssue('QUIT');
    this._state = 'update';
  }

  /**
   * The transport has been released. Terminal.
   */
  closed(): void {
    this._state = 'closed';
    this.userAccepted = false;
  }

  private expect(state: SessionState, verb: Pop3Verb): void {
    if (this._state !== state) {
      throw new Pop3StateError(`Unexpected ${verb} reply in ${this._state} state`, this._state, verb);
    }
  }
}
